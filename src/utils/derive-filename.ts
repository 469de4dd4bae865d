import { posix } from "node:path";

/**
 * Derive a local filename from an image URL
 * Drops the query string, then keeps the final path segment
 *
 * @example
 * deriveFilename("https://images.example.com/photos/42/pic.jpg?auto=compress") // "pic.jpg"
 */
export function deriveFilename(url: string): string {
  const queryStart = url.indexOf("?");
  const withoutQuery = queryStart === -1 ? url : url.slice(0, queryStart);
  return posix.basename(withoutQuery);
}
