/**
 * Composite text a catalog entry is embedded from.
 *
 * Ingestion, the backfill script and the fallback scan all embed the same
 * text so stored and recomputed vectors agree.
 */
export function buildCatalogText(entry: {
  title: string
  description?: string | null
  category?: string | null
}): string {
  return [entry.title, entry.description ?? '', entry.category ?? ''].join(' ')
}
