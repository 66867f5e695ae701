/** The user on whose behalf a request runs */
export interface Viewer {
  userId: string;
  isAdmin: boolean;
}

export function canAccess(viewer: Viewer, ownerId: string): boolean {
  return viewer.isAdmin || viewer.userId === ownerId;
}
