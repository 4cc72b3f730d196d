import { INPUT_KINDS, type ElementKind, type ElementSnapshot, type InputKind } from './types.js';

const GROUP_ROLES = new Set(['radiogroup', 'group']);

function toInputKind(type: string | undefined): InputKind | undefined {
  const normalized = type?.trim().toLowerCase();
  if (!normalized) return undefined;
  return INPUT_KINDS.find((kind) => kind === normalized);
}

/**
 * Map a control to the fill routine that handles it. Unknown or missing
 * input types (number, date, ...) are filled as text.
 */
export function classifyElement(snapshot: ElementSnapshot): ElementKind {
  const tag = snapshot.tag.trim().toLowerCase();
  const role = snapshot.attributes.role?.trim().toLowerCase();
  const hasChoices = (snapshot.choices?.length ?? 0) > 0;

  if (tag === 'textarea') return 'textarea';
  if (tag === 'select') return 'select';
  if (tag === 'fieldset' || role === 'radiogroup') return 'fieldset';
  if (role !== undefined && GROUP_ROLES.has(role) && hasChoices) return 'fieldset';

  return toInputKind(snapshot.type ?? snapshot.attributes.type) ?? 'text';
}

/** Kinds whose value goes through `fill()`. */
export function isTextLike(kind: ElementKind): boolean {
  return (
    kind === 'text' ||
    kind === 'email' ||
    kind === 'tel' ||
    kind === 'url' ||
    kind === 'search' ||
    kind === 'password' ||
    kind === 'textarea'
  );
}
