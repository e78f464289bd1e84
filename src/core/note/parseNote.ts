import type { NoteAuthor, NoteFile, NoteView, RawNote } from "./note.types";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (value: unknown): string | null =>
  typeof value === "string" && value !== "" ? value : null;

const readCount = (value: unknown): number =>
  typeof value === "number" && Number.isFinite(value) ? value : 0;

const readDimension = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

/**
 * Sum of every numeric tally in the reactions map. Anything that is not a map counts as zero.
 */
export const sumReactions = (reactions: unknown): number => {
  if (!isRecord(reactions)) return 0;
  let total = 0;
  for (const count of Object.values(reactions)) {
    total += readCount(count);
  }
  return total;
};

/**
 * Note ids are opaque strings; numeric ids from forks are accepted as their decimal form.
 */
export const readNoteId = (value: unknown): string | null => {
  if (typeof value === "string") return value.trim() === "" ? null : value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return String(value);
  return null;
};

const parseAuthor = (value: unknown): NoteAuthor => {
  const user = isRecord(value) ? value : {};
  return {
    name: readString(user.name),
    username: readString(user.username) ?? "",
    host: readString(user.host),
    avatarUrl: readString(user.avatarUrl) ?? ""
  };
};

const parseFile = (value: unknown): NoteFile | undefined => {
  if (!isRecord(value)) return undefined;
  const properties = isRecord(value.properties) ? value.properties : {};
  return {
    id: readString(value.id),
    url: readString(value.url) ?? "",
    name: readString(value.name),
    type: readString(value.type) ?? "",
    width: readDimension(properties.width),
    height: readDimension(properties.height),
    isSensitive: value.isSensitive === true,
    comment: readString(value.comment) ?? ""
  };
};

export const parseNote = (raw: RawNote): NoteView => {
  const files = Array.isArray(raw.files)
    ? raw.files.flatMap((file) => {
        const parsed = parseFile(file);
        return parsed ? [parsed] : [];
      })
    : [];

  return {
    id: readNoteId(raw.id),
    user: parseAuthor(raw.user),
    text: readString(raw.text) ?? "",
    cw: readString(raw.cw),
    createdAt: readString(raw.createdAt) ?? "",
    repliesCount: readCount(raw.repliesCount),
    renoteCount: readCount(raw.renoteCount),
    reactionCount: sumReactions(raw.reactions),
    visibility: readString(raw.visibility) ?? "public",
    files
  };
};
