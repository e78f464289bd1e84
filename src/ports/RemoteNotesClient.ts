import type { RawNote, RemoteUser } from "../core/note/note.types";

export type FetchUserNotesParams = {
  userId: string;
  limit: number;
  untilId?: string;
};

export interface RemoteNotesClient {
  call(instance: string, endpoint: string, payload: Record<string, unknown>): Promise<unknown>;
  lookupUser(instance: string, username: string): Promise<RemoteUser>;
  fetchNote(instance: string, noteId: string): Promise<RawNote>;
  fetchUserNotes(instance: string, params: FetchUserNotesParams): Promise<RawNote[]>;
}
