import type { FetchUserNotesParams, RemoteNotesClient } from "../../ports/RemoteNotesClient";
import type { RawNote, RemoteUser } from "../../core/note/note.types";
import { isRecord } from "../../core/note/parseNote";
import { RemoteError } from "../../core/errors";
import { maxRemotePageSize } from "../../application/archive/archive.config";
import { retry, RetryExhaustedError } from "../../shared/retry/retry";
import type { SleepFn } from "../../shared/time/sleep";

export type MisskeyHttpClientOptions = {
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  userAgent?: string;
  sleepFn?: SleepFn;
};

const maxBodyFragment = 300;

/**
 * Unauthenticated client for the Misskey-family `/api/<endpoint>` surface.
 * Busy instances answer 500 under load, so 500s and transport failures are
 * retried with a linear 2s, 4s backoff; every other status fails at once.
 */
export class MisskeyHttpClient implements RemoteNotesClient {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly userAgent: string;
  private readonly sleepFn?: SleepFn;

  constructor(options: MisskeyHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.userAgent = options.userAgent ?? "notes-archiver/1.0";
    this.sleepFn = options.sleepFn;
  }

  async call(instance: string, endpoint: string, payload: Record<string, unknown>): Promise<unknown> {
    const url = `${instance.replace(/\/+$/, "")}/api/${endpoint}`;
    const context = { instance, endpoint };
    const body = JSON.stringify(payload);

    const transportError = (err: unknown, aborted: boolean): RemoteError =>
      aborted
        ? new RemoteError({
            code: "remote_timeout",
            message: `Request to ${url} timed out after ${this.timeoutMs}ms`,
            context,
            cause: err
          })
        : new RemoteError({
            code: "remote_transport",
            message: `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
            context,
            cause: err
          });

    const doFetch = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      let res: Response;
      let text: string;
      // The timer covers the body as well as the headers.
      try {
        res = await fetch(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "User-Agent": this.userAgent
          },
          body,
          signal: controller.signal
        });
        text = await res.text();
      } catch (err) {
        throw transportError(err, controller.signal.aborted);
      } finally {
        clearTimeout(timeout);
      }

      if (!res.ok) {
        const fragment = text.slice(0, maxBodyFragment);
        throw new RemoteError({
          code: "remote_status",
          message: `API error ${res.status} from ${instance}: ${fragment}`,
          status: res.status,
          body: fragment,
          context
        });
      }

      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (err) {
        throw new RemoteError({
          code: "remote_payload",
          message: `API response from ${url} is not valid JSON`,
          status: res.status,
          context,
          cause: err
        });
      }
    };

    try {
      return await retry(doFetch, {
        retries: this.maxAttempts - 1,
        minDelayMs: this.retryDelayMs,
        maxDelayMs: this.retryDelayMs * this.maxAttempts,
        backoff: "linear",
        jitterRatio: 0,
        sleepFn: this.sleepFn,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          const remoteError = error instanceof RemoteError ? error : undefined;
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.retry",
            status: remoteError?.status ?? null,
            code: remoteError?.code ?? null,
            url,
            attempt,
            maxAttempts,
            delayMs
          }));
        },
        onGiveUp: ({ attempt, maxAttempts, error }) => {
          const remoteError = error instanceof RemoteError ? error : undefined;
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.give_up",
            status: remoteError?.status ?? null,
            code: remoteError?.code ?? null,
            url,
            attempt,
            maxAttempts
          }));
        },
        shouldRetry: (err) => {
          if (!(err instanceof RemoteError)) return false;
          if (err.code === "remote_transport" || err.code === "remote_timeout") return true;
          return err.code === "remote_status" && err.status === 500;
        }
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        const last = err.lastError instanceof RemoteError ? err.lastError : undefined;
        throw new RemoteError({
          code: "remote_exhausted",
          message: `API request failed after ${err.attempts} attempts: ${last?.message ?? String(err.lastError)}`,
          status: last?.status,
          body: last?.body,
          context,
          cause: err.lastError
        });
      }
      throw err;
    }
  }

  async lookupUser(instance: string, username: string): Promise<RemoteUser> {
    const user = await this.call(instance, "users/show", { username });
    if (!isRecord(user) || typeof user.id !== "string" || user.id === "") {
      throw new RemoteError({
        code: "remote_payload",
        message: `users/show on ${instance} returned no user id for ${username}`,
        context: { instance, endpoint: "users/show" }
      });
    }
    return { ...user, id: user.id };
  }

  async fetchNote(instance: string, noteId: string): Promise<RawNote> {
    const note = await this.call(instance, "notes/show", { noteId });
    if (!isRecord(note)) {
      throw new RemoteError({
        code: "remote_payload",
        message: `notes/show on ${instance} did not return a note object`,
        context: { instance, endpoint: "notes/show" }
      });
    }
    return note;
  }

  async fetchUserNotes(instance: string, params: FetchUserNotesParams): Promise<RawNote[]> {
    const payload: Record<string, unknown> = {
      userId: params.userId,
      limit: Math.max(1, Math.min(params.limit, maxRemotePageSize)),
      includeReplies: false,
      withRenotes: false
    };
    if (params.untilId) payload.untilId = params.untilId;

    const notes = await this.call(instance, "users/notes", payload);
    if (!Array.isArray(notes)) {
      throw new RemoteError({
        code: "remote_payload",
        message: `users/notes on ${instance} did not return an array`,
        context: { instance, endpoint: "users/notes" }
      });
    }
    return notes.filter(isRecord);
  }
}
