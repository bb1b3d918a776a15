/** TAR entry kinds the index walker distinguishes. */
export type TarEntryType = 'file' | 'directory' | 'symlink' | 'link' | 'other';

/** Header fields of one archive entry, after pax and GNU extensions are applied. */
export interface TarHeader {
  path: string;
  type: TarEntryType;
  size: number;
  /** Modification time, POSIX seconds. */
  mtime: number;
  mode: number;
  uid: number;
  gid: number;
  userName: string;
  groupName: string;
  linkName: string;
}

export interface TarRecord {
  header: TarHeader;
  content: Uint8Array;
  /** Byte offset of the entry's header block. */
  offset: number;
}
