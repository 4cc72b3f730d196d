import { MAX_FIELD_NAME_LENGTH } from '../config/constants.js';
import type { ElementSnapshot } from './types.js';

/** Strip required/colon markers and collapse whitespace. */
export function cleanFieldName(raw: string): string {
  return raw.replace(/[*:]/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Derive a human-meaningful name for a control.
 *
 * Priority: name, id, label text, aria-label, placeholder, then the
 * aria-labelledby text and data-testid. Returns '' when nothing is usable.
 */
export function resolveFieldName(snapshot: ElementSnapshot, maxLength = MAX_FIELD_NAME_LENGTH): string {
  const { attributes } = snapshot;
  const candidates = [
    attributes.name,
    attributes.id,
    snapshot.labelText,
    attributes['aria-label'],
    attributes.placeholder,
    snapshot.labelledByText,
    attributes['data-testid'],
  ];

  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    const cleaned = cleanFieldName(candidate);
    if (cleaned) return cleaned.slice(0, maxLength).trimEnd();
  }
  return '';
}
