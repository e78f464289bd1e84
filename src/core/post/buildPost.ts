import { createHash } from "crypto";
import type { NoteFile, NoteView } from "../note/note.types";
import type { MediaRecord, PostRecord } from "./post.types";

export const computePostId = (instance: string, noteId: string): string =>
  `${new URL(instance).host}/${noteId}`;

export const noteUrl = (instance: string, noteId: string): string =>
  `${instance.replace(/\/+$/, "")}/notes/${noteId}`;

/**
 * Directory-safe form of an id: everything outside `[A-Za-z0-9_-]` becomes `_`.
 */
export const toBucket = (id: string): string => id.replace(/[^A-Za-z0-9_-]/g, "_");

export const attachmentIdFor = (file: Pick<NoteFile, "id" | "url">): string =>
  file.id ?? createHash("md5").update(file.url).digest("hex").slice(0, 10);

export const formatHandle = (user: NoteView["user"]): string =>
  "@" + [user.username, ...(user.host ? [user.host] : [])].join("@");

export const buildPostRecord = (args: {
  instance: string;
  noteId: string;
  note: NoteView;
  rawJson: string;
  archivedAt: Date;
}): PostRecord => {
  const { instance, noteId, note } = args;
  return {
    _id: computePostId(instance, noteId),
    instance,
    noteId,
    url: noteUrl(instance, noteId),
    archivedAt: args.archivedAt.toISOString(),
    userName: note.user.name ?? note.user.username,
    userHandle: formatHandle(note.user),
    userAvatar: note.user.avatarUrl,
    content: note.text,
    cw: note.cw,
    createdAt: note.createdAt,
    replyCount: note.repliesCount,
    renoteCount: note.renoteCount,
    reactionCount: note.reactionCount,
    visibility: note.visibility,
    rawJson: args.rawJson,
    screenshotPath: null
  };
};

export const buildMediaRecord = (postId: string, file: NoteFile, localPath: string | null): MediaRecord => {
  const attachmentId = attachmentIdFor(file);
  return {
    _id: `${postId}/${attachmentId}`,
    postId,
    filename: file.name ?? attachmentId,
    url: file.url,
    mimeType: file.type,
    localPath,
    width: file.width,
    height: file.height,
    isSensitive: file.isSensitive,
    altText: file.comment
  };
};
