import type { MediaRecord, PostRecord } from "../core/post/post.types";

export type MirrorOptions = {
  /** Maps a media row to the `src` used in the page; defaults to the origin URL. */
  mediaSrc?: (media: MediaRecord) => string;
};

const htmlEscapes: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (ch) => htmlEscapes[ch] ?? ch);

const renderMedia = (media: MediaRecord, src: string): string => {
  const alt = escapeHtml(media.altText || media.filename || "");
  const cls = media.isSensitive ? "media-item sensitive" : "media-item";
  const safeSrc = escapeHtml(src);
  if (media.mimeType.startsWith("image/")) {
    return `<figure class="${cls}"><img src="${safeSrc}" alt="${alt}" loading="lazy"><figcaption>${alt}</figcaption></figure>`;
  }
  if (media.mimeType.startsWith("video/")) {
    return `<figure class="${cls}"><video src="${safeSrc}" controls></video><figcaption>${alt}</figcaption></figure>`;
  }
  if (media.mimeType.startsWith("audio/")) {
    return `<figure class="${cls}"><audio src="${safeSrc}" controls></audio><figcaption>${alt}</figcaption></figure>`;
  }
  return "";
};

const styles = `
  body{background:#0f1117;color:#e2e4ef;font-family:system-ui,sans-serif;margin:0;padding:2rem 1rem}
  .card{max-width:640px;margin:0 auto;background:#1a1d2e;border:1px solid #2d3154;border-radius:16px;overflow:hidden}
  .card-header{padding:1.25rem 1.5rem;border-bottom:1px solid #2d3154;display:flex;align-items:center;gap:1rem}
  .avatar{width:48px;height:48px;border-radius:50%;background:#2d3154;object-fit:cover}
  .name{font-weight:700}.handle{color:#8b8fa8;font-size:.85rem}
  .card-body{padding:1.5rem}.content{line-height:1.7}
  .cw-warning{border:1px solid #f59e0b;color:#f59e0b;padding:.75rem 1rem;border-radius:8px;margin-bottom:1rem}
  .media-grid{display:grid;grid-template-columns:repeat(auto-fit,minmax(240px,1fr));gap:.75rem;margin-top:1.25rem}
  .media-item{margin:0;border-radius:10px;overflow:hidden;background:#000}
  .media-item img,.media-item video{width:100%;display:block;max-height:480px;object-fit:cover}
  .media-item.sensitive img,.media-item.sensitive video{filter:blur(20px)}
  figcaption{padding:.4rem .6rem;font-size:.75rem;color:#8b8fa8}
  .card-footer{padding:1rem 1.5rem;border-top:1px solid #2d3154;font-size:.85rem;color:#8b8fa8;display:flex;flex-wrap:wrap;gap:.75rem}
  a{color:#7c6ff7}`;

/**
 * Standalone HTML card for one archived post. The `.card` element is what
 * snapshots crop to.
 */
export const renderPostMirror = (post: PostRecord, media: MediaRecord[], options: MirrorOptions = {}): string => {
  const mediaSrc = options.mediaSrc ?? ((m: MediaRecord) => m.url);
  const mediaHtml = media.map((m) => renderMedia(m, mediaSrc(m))).join("\n");
  const handle = escapeHtml(post.userHandle);
  const avatar = post.userAvatar
    ? `<img class="avatar" src="${escapeHtml(post.userAvatar)}" alt="">`
    : `<div class="avatar"></div>`;
  const cw = post.cw ? `<div class="cw-warning"><strong>Content warning:</strong> ${escapeHtml(post.cw)}</div>` : "";
  const content = escapeHtml(post.content).replace(/\n/g, "<br>");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8"><meta name="viewport" content="width=device-width,initial-scale=1">
<title>Archived post by ${handle}</title>
<style>${styles}</style>
</head>
<body>
<div class="card">
  <div class="card-header">
    ${avatar}
    <div><div class="name">${escapeHtml(post.userName || post.userHandle)}</div><div class="handle">${handle}</div></div>
  </div>
  <div class="card-body">
    ${cw}
    <div class="content">${content}</div>
    ${mediaHtml ? `<div class="media-grid">${mediaHtml}</div>` : ""}
  </div>
  <div class="card-footer">
    <span>replies ${post.replyCount}</span>
    <span>renotes ${post.renoteCount}</span>
    <span>reactions ${post.reactionCount}</span>
    <span>${escapeHtml(post.visibility)}</span>
    <span>posted ${escapeHtml(post.createdAt.slice(0, 10))}</span>
    <a href="${escapeHtml(post.url)}" rel="noopener">original</a>
  </div>
</div>
</body></html>`;
};
