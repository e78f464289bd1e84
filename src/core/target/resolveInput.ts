import { InputError } from "../errors";
import type { FetchTarget, ResolvedInput } from "./FetchTarget";

const notePathPattern = /\/notes\/([A-Za-z0-9]+)$/;
const compatPostPathPattern = /\/(?:posts|statuses)\/([A-Za-z0-9]+)$/;
const profilePathPattern = /^\/@([A-Za-z0-9_.-]+)$/;
const handlePattern = /^@?([A-Za-z0-9_.-]+)@([A-Za-z0-9_.-]+\.[A-Za-z]{2,})$/;
const bareUsernamePattern = /^[A-Za-z0-9_.-]+$/;

const parseAbsoluteHttpUrl = (raw: string): URL | undefined => {
  if (!/^https?:\/\//i.test(raw)) return undefined;
  try {
    const url = new URL(raw);
    return url.host ? url : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Turns a post URL, profile URL, fediverse handle or bare username into a fetch target.
 */
export const resolveInput = (input: string): ResolvedInput => {
  const raw = input.trim();
  const url = parseAbsoluteHttpUrl(raw);

  if (url) {
    const instance = url.origin;
    const path = url.pathname.replace(/\/+$/, "");

    const note = notePathPattern.exec(path) ?? compatPostPathPattern.exec(path);
    if (note) {
      return { kind: "note", instance, noteId: note[1] };
    }

    const profile = profilePathPattern.exec(path);
    if (profile) {
      return { kind: "user", instance, username: profile[1] };
    }

    throw new InputError("unrecognized_location", `Cannot extract note or user from URL: ${raw}`);
  }

  const handle = handlePattern.exec(raw);
  if (handle) {
    return { kind: "user", instance: `https://${handle[2]}`, username: handle[1] };
  }

  if (bareUsernamePattern.test(raw)) {
    return { kind: "user", instance: null, username: raw };
  }

  throw new InputError("unrecognized_input", `Unrecognised input: ${raw}`);
};

/**
 * Reduces an instance given as `host`, `https://host/` or a URL with a path to `scheme://host`.
 */
export const normalizeInstance = (value: string): string => {
  const trimmed = value.trim();
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new InputError("unrecognized_input", `Instance is not a valid host or URL: ${value}`);
  }
  if (!parsed.host) {
    throw new InputError("unrecognized_input", `Instance is not a valid host or URL: ${value}`);
  }
  return parsed.origin;
};

/**
 * The instance detected in the input wins; the override only fills a missing one.
 */
export const applyInstance = (resolved: ResolvedInput, override?: string | null): FetchTarget => {
  if (resolved.kind === "note") return resolved;

  const detected = resolved.instance;
  if (detected) {
    return { kind: "user", instance: detected, username: resolved.username };
  }

  const supplied = override?.trim();
  if (!supplied) {
    throw new InputError(
      "instance_required",
      "Instance URL required: include it in the URL or handle, or supply the instance separately."
    );
  }

  return { kind: "user", instance: normalizeInstance(supplied), username: resolved.username };
};
