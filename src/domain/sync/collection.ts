export interface RemoteAlbum {
  id: string;
  albumName: string;
}

export interface ResolvedCollection {
  id: string;
  name: string;
}

// Exact, case-sensitive; the server keeps album names unique so the first hit wins.
export function findCollectionByName(
  albums: readonly RemoteAlbum[],
  name: string,
): ResolvedCollection | undefined {
  const match = albums.find((album) => album.albumName === name);
  return match ? { id: match.id, name: match.albumName } : undefined;
}
