import type { SearchIndex } from "./interface.js";

/** Walk `listKeys` to exhaustion and return every stored key. */
export async function collectAllKeys(
  index: SearchIndex,
  pageSize: number,
): Promise<Set<string>> {
  const keys = new Set<string>();
  let after: string | undefined;

  for (;;) {
    const page = await index.listKeys({ after, limit: pageSize });
    for (const key of page.keys) keys.add(key);
    if (page.nextCursor === null) return keys;
    after = page.nextCursor;
  }
}
