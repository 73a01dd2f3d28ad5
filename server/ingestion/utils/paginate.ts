import { createLogger } from "../../_core/logger";
import type { FetchResult } from "../sources/types";

const log = createLogger("paginate");

/**
 * Fetches page 1, then pages 2..maxPage, and concatenates array `data` in page order.
 * A later page that fails is logged and left out.
 */
export async function fetchAllPages(
  fetchPage: (page: number) => Promise<FetchResult>,
  label = "resource"
): Promise<FetchResult> {
  const first = await fetchPage(1);
  if (!first.ok) return first;

  const { data, pager } = first.payload;
  if (!pager || pager.maxPage <= 1 || !Array.isArray(data)) {
    return first;
  }

  const combined: unknown[] = [...data];
  for (let page = 2; page <= pager.maxPage; page++) {
    const next = await fetchPage(page);
    if (!next.ok) {
      log.warn(`Page ${page}/${pager.maxPage} of ${label} failed: ${next.error}`);
      continue;
    }
    if (Array.isArray(next.payload.data)) {
      combined.push(...next.payload.data);
    } else {
      log.warn(`Page ${page}/${pager.maxPage} of ${label} carried no list`);
    }
  }

  log.debug(`Fetched ${pager.maxPage} pages of ${label}`, { records: combined.length });
  return { ok: true, payload: { data: combined, pager: { ...pager, currentPage: pager.maxPage } } };
}
