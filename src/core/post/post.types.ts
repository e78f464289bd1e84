/**
 * Stored post. `_id` is `<instance host>/<note id>` and never changes; only
 * `screenshotPath` is written after insertion.
 */
export type PostRecord = {
  _id: string;
  instance: string;
  noteId: string;
  url: string;
  archivedAt: string;
  userName: string;
  userHandle: string;
  userAvatar: string;
  content: string;
  cw: string | null;
  createdAt: string;   // as reported by the origin, not reparsed
  replyCount: number;
  renoteCount: number;
  reactionCount: number;
  visibility: string;
  rawJson: string;     // full API response, verbatim
  screenshotPath: string | null;
};

export type MediaRecord = {
  _id: string;         // `<post id>/<attachment id>`
  postId: string;
  filename: string;
  url: string;
  mimeType: string;
  localPath: string | null;
  width: number | null;
  height: number | null;
  isSensitive: boolean;
  altText: string;
};

export type PostListing = Omit<PostRecord, "rawJson" | "instance" | "noteId"> & {
  mediaCount: number;
};
