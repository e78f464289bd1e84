/**
 * Notes arrive as loosely-typed JSON. `RawNote` is what the API returned;
 * `NoteView` is the subset the archive reads, with every field defaulted.
 */
export type RawNote = Record<string, unknown>;

export type RemoteUser = {
  id: string;
} & Record<string, unknown>;

export type NoteAuthor = {
  name: string | null;
  username: string;
  host: string | null;
  avatarUrl: string;
};

export type NoteFile = {
  id: string | null;
  url: string;
  name: string | null;
  type: string;
  width: number | null;
  height: number | null;
  isSensitive: boolean;
  comment: string;
};

export type NoteView = {
  id: string | null;
  user: NoteAuthor;
  text: string;
  cw: string | null;
  createdAt: string;
  repliesCount: number;
  renoteCount: number;
  reactionCount: number;
  visibility: string;
  files: NoteFile[];
};
