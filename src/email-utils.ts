// Email header and label helpers.
// Wraps the `email-addresses` package (RFC 5322 parser) with simpler return types,
// and maps Gmail's CATEGORY_* system labels onto the cache's category enum.

import { parseFrom as _parseFrom } from 'email-addresses'
import { CATEGORIES, type Category } from './mail-client.js'

export interface Sender {
  name: string
  email: string
}

const FALLBACK_EMAIL = 'unknown'

/**
 * Parse an RFC 5322 "From" header into a { name, email } object.
 * Falls back to the bracketed address, then to the raw header, when the
 * strict parser rejects it (common with malformed bulk mail).
 * The email is lower-cased so one sender groups under one key.
 */
export function parseFrom(fromHeader: string): Sender {
  const header = fromHeader.trim()
  if (!header) return { name: FALLBACK_EMAIL, email: FALLBACK_EMAIL }

  const first = _parseFrom(header)?.[0]
  if (first) {
    if (first.type === 'group') {
      const address = first.addresses[0]?.address
      const email = address ? address.toLowerCase() : FALLBACK_EMAIL
      return { name: first.name || email, email }
    }
    const email = first.address.toLowerCase()
    return { name: first.name || email, email }
  }

  // Lenient fallback: "Name <addr>" with characters the RFC parser refuses
  const bracket = /<([^<>]+)>/.exec(header)
  if (bracket?.[1]) {
    const email = bracket[1].trim().toLowerCase()
    const name = header.slice(0, bracket.index).trim().replace(/^"|"$/g, '')
    return { name: name || email, email }
  }

  return { name: header, email: header.toLowerCase() }
}

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

const CATEGORY_LABELS: Record<string, Category> = {
  CATEGORY_PERSONAL: 'primary',
  CATEGORY_SOCIAL: 'social',
  CATEGORY_PROMOTIONS: 'promotions',
  CATEGORY_UPDATES: 'updates',
  CATEGORY_FORUMS: 'forums',
}

/** Map Gmail label ids to a category. Messages without a category label are 'unknown'. */
export function categoryFromLabels(labelIds: string[]): Category {
  for (const label of labelIds) {
    const category = CATEGORY_LABELS[label]
    if (category) return category
  }
  return 'unknown'
}

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((c) => c === value)
}

/** Read a category back from storage; anything unrecognised becomes 'unknown'. */
export function toCategory(value: string): Category {
  return isCategory(value) ? value : 'unknown'
}
