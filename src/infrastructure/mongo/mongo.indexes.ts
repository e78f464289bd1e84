/**
 * Ids are natural keys (`_id` = post id / media id), so insert-if-absent only
 * needs the default `_id` index. These serve the read paths.
 */
export const mongoIndexes = {
  posts: [
    { keys: { archivedAt: -1 }, options: { name: "archivedAt_desc" } },
    { keys: { screenshotPath: 1 }, options: { name: "screenshotPath" } }
  ],
  media: [
    { keys: { postId: 1 }, options: { name: "postId" } }
  ]
} as const;
