import type { ScoredEntry } from '../services/assistant'

export interface RankedResource {
  id: string
  title: string
  description: string
  category: string
  url: string
  score: number
}

/** Response shape of a ranked entry; the stored vector is not exposed */
export function toRankedResource({ entry, score }: ScoredEntry): RankedResource {
  return {
    id: entry.id,
    title: entry.title,
    description: entry.description,
    category: entry.category,
    url: entry.url,
    score,
  }
}
