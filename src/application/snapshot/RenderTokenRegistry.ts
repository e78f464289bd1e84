import { nanoid } from "nanoid";

/**
 * In-memory token → HTML map backing the loopback `/render/<token>` route.
 * Entries only live for the duration of `withRegistration`.
 */
export class RenderTokenRegistry {
  private readonly pages = new Map<string, string>();

  resolve(token: string): string | undefined {
    return this.pages.get(token);
  }

  size(): number {
    return this.pages.size;
  }

  async withRegistration<T>(html: string, use: (token: string) => Promise<T>): Promise<T> {
    const token = nanoid(16);
    this.pages.set(token, html);
    try {
      return await use(token);
    } finally {
      this.pages.delete(token);
    }
  }
}
