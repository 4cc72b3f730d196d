/**
 * Form-filling engine types.
 *
 * The engine never touches Playwright directly: it reads an `ElementSnapshot`
 * and acts through a `FormElementHandle`. `browser/PlaywrightFormElement.ts`
 * is the production implementation; tests use plain fakes.
 */

import type { FormFillingErrorCode } from '../errors.js';

// ── Element kinds ─────────────────────────────────────────────────────

export const INPUT_KINDS = [
  'text',
  'email',
  'tel',
  'url',
  'search',
  'password',
  'radio',
  'checkbox',
  'file',
] as const;

export type InputKind = (typeof INPUT_KINDS)[number];

export type ElementKind = InputKind | 'textarea' | 'select' | 'fieldset';

export type ChoiceKind = 'radio' | 'checkbox';

// ── Browser contract ──────────────────────────────────────────────────

export interface ChoiceSnapshot {
  kind: ChoiceKind;
  /** Visible label, falling back to aria-label, then the value attribute. */
  label: string;
  value: string;
  checked: boolean;
}

/** Attribute view of one control, read in a single round trip. */
export interface ElementSnapshot {
  /** Lowercase tag name, e.g. "input". */
  tag: string;
  /** `type` attribute as written, if any. */
  type?: string;
  attributes: Record<string, string>;
  /** Text of `<label for=id>` or a wrapping `<label>`. */
  labelText?: string;
  /** Text of the elements referenced by `aria-labelledby`. */
  labelledByText?: string;
  /** Visible option labels of a `<select>`. */
  options?: string[];
  /** Radio or checkbox members of a group. */
  choices?: ChoiceSnapshot[];
}

export interface FormElementHandle {
  snapshot(): Promise<ElementSnapshot>;
  fill(value: string): Promise<void>;
  selectOption(label: string): Promise<void>;
  setChecked(checked: boolean): Promise<void>;
  click(): Promise<void>;
  setInputFiles(filePath: string): Promise<void>;
  /** Handle for the n-th member of a group, in snapshot `choices` order. */
  choice(index: number): FormElementHandle;
}

// ── Values ────────────────────────────────────────────────────────────

export type KnownValue = string | number | boolean | null;

/** Caller-supplied facts. Key order is match order; never mutated. */
export type KnownData = Readonly<Record<string, KnownValue | undefined>>;

export interface FieldDescriptor {
  name: string;
  kind: ElementKind;
  /** Option or choice labels offered by the control. */
  options?: string[];
}

export type Provenance = 'matched' | 'generated' | 'default';

export interface ResolvedValue {
  value: string;
  provenance: Provenance;
  /** KnownData key that produced the value, when matched. */
  key?: string;
  score?: number;
}

// ── Results ───────────────────────────────────────────────────────────

export type FillState =
  | 'unfilled'
  | 'matched'
  | 'generated'
  | 'defaulted'
  | 'filled'
  | 'fill_failed'
  | 'skipped';

export type FillStatus = 'filled' | 'skipped' | 'failed';

export interface FieldResult {
  index: number;
  fieldName: string;
  kind: ElementKind;
  state: FillState;
  status: FillStatus;
  value?: ResolvedValue;
  error?: { code: FormFillingErrorCode; message: string };
}

export interface FillReport {
  results: FieldResult[];
  filled: number;
  skipped: number;
  failed: number;
}
