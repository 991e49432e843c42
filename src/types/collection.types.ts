/**
 * One collection-to-directory mapping. Immutable for the length of a run.
 */
export type CollectionRef = {
  /** Remote playlist locator handed to the lister */
  remoteLocator: string;
  /** Show name; also the first filename component */
  displayName: string;
  /** Season token used in filenames, e.g. "S01" */
  seasonTag: string;
  localDirectory: string;
  logDirectory: string;
};

/**
 * An item of the remote collection, produced fresh by each listing
 */
export type RemoteItem = {
  /** 1-based, stable ordering from the lister */
  position: number;
  /** Fixed-length stable identifier */
  id: string;
  title: string;
  locator: string;
};

/**
 * A materialized file known to the media index
 */
export type LocalMediaFile = {
  path: string;
  position: number;
  id: string;
};

/**
 * Descriptive metadata written into a materialized file
 */
export type ItemMetadata = {
  title: string;
  artist?: string;
  album: string;
  comment?: string;
  /** ISO calendar date */
  date?: string;
  genre?: string;
};

/**
 * Descriptive fields the fetch tool reports for an item
 */
export type ItemInfo = {
  title?: string;
  uploader?: string;
  description?: string;
  /** As printed by the tool, usually `YYYYMMDD` */
  uploadDate?: string;
  tags: string[];
};
