export { EventRepository } from './event.repository.js';
export { VmRepository } from './vm.repository.js';
export { CredentialRepository } from './credential.repository.js';
