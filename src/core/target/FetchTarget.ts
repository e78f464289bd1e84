export type NoteTarget = {
  kind: "note";
  instance: string;
  noteId: string;
};

export type UserTarget = {
  kind: "user";
  instance: string;
  username: string;
};

export type FetchTarget = NoteTarget | UserTarget;

/**
 * A bare username resolves to a user target whose instance has to come from
 * somewhere else (see `applyInstance`).
 */
export type ResolvedInput =
  | NoteTarget
  | (Omit<UserTarget, "instance"> & { instance: string | null });
