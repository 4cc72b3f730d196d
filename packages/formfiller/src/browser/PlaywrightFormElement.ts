/**
 * PlaywrightFormElement: the engine's FormElementHandle over a Playwright Locator.
 *
 * The snapshot is read in one evaluate() round trip. Page-side code is passed
 * as a string so the Node build needs no DOM typings.
 */

import type { Locator } from 'playwright-core';
import { z } from 'zod';
import { DEFAULT_ELEMENT_TIMEOUT_MS } from '../config/constants.js';
import type { ElementSnapshot, FormElementHandle } from '../engine/types.js';

/** Attribute that marks collected controls with their DOM-order index. */
export const FORM_FILL_ATTR = 'data-formfill-id';
/** Attribute that marks a group member as `<groupId>:<choiceIndex>`. */
export const CHOICE_ATTR = 'data-formfill-choice';

export const CHOICE_SELECTOR = 'input[type="radio"], input[type="checkbox"]';
export const GROUP_SELECTOR = 'fieldset, [role="radiogroup"], [role="group"]';

const choiceSnapshotSchema = z.object({
  kind: z.enum(['radio', 'checkbox']),
  label: z.string(),
  value: z.string(),
  checked: z.boolean(),
});

const elementSnapshotSchema = z.object({
  tag: z.string().min(1),
  type: z.string().optional(),
  attributes: z.record(z.string()),
  labelText: z.string().optional(),
  labelledByText: z.string().optional(),
  options: z.array(z.string()).optional(),
  choices: z.array(choiceSnapshotSchema).optional(),
});

/** Validate what the page script returned; empty label strings become absent. */
export function normalizeSnapshot(raw: unknown): ElementSnapshot {
  const parsed = elementSnapshotSchema.parse(raw);
  return {
    ...parsed,
    tag: parsed.tag.toLowerCase(),
    labelText: parsed.labelText?.trim() || undefined,
    labelledByText: parsed.labelledByText?.trim() || undefined,
  };
}

const SNAPSHOT_SCRIPT = `(el) => {
  var GROUP = ${JSON.stringify(GROUP_SELECTOR)};
  var CHOICE = ${JSON.stringify(CHOICE_SELECTOR)};
  function text(node) {
    return node && node.textContent ? node.textContent.replace(/\\s+/g, ' ').trim() : '';
  }

  var attributes = {};
  for (var i = 0; i < el.attributes.length; i++) {
    attributes[el.attributes[i].name] = el.attributes[i].value;
  }

  var labelText = '';
  if (el.id) labelText = text(document.querySelector('label[for="' + CSS.escape(el.id) + '"]'));
  if (!labelText && el.closest('label')) labelText = text(el.closest('label'));
  if (!labelText && el.tagName === 'FIELDSET') labelText = text(el.querySelector('legend'));

  var labelledByText = '';
  var ids = el.getAttribute('aria-labelledby');
  if (ids) {
    labelledByText = ids.split(/\\s+/).map(function (id) {
      return text(document.getElementById(id));
    }).filter(Boolean).join(' ');
  }

  var options;
  if (el.tagName === 'SELECT') {
    options = Array.from(el.options).map(function (o) { return (o.label || o.textContent || '').trim(); });
  }

  var choices;
  if (el.matches(GROUP)) {
    choices = Array.from(el.querySelectorAll(CHOICE)).filter(function (input) {
      return input.closest(GROUP) === el;
    }).map(function (input) {
      var label = input.labels && input.labels.length > 0 ? text(input.labels[0]) : '';
      return {
        kind: input.type === 'checkbox' ? 'checkbox' : 'radio',
        label: label || input.getAttribute('aria-label') || input.value || '',
        value: input.value || '',
        checked: !!input.checked,
      };
    });
  }

  var type = el.getAttribute('type');
  return {
    tag: el.tagName.toLowerCase(),
    type: type === null ? undefined : type,
    attributes: attributes,
    labelText: labelText,
    labelledByText: labelledByText,
    options: options,
    choices: choices,
  };
}`;

export interface PlaywrightFormElementOptions {
  timeoutMs?: number;
  /** Collection index; lets `choice()` use the markers set by collectFormElements. */
  formFillId?: string;
}

export class PlaywrightFormElement implements FormElementHandle {
  private readonly timeout: number;
  private readonly formFillId?: string;

  constructor(
    readonly locator: Locator,
    opts: PlaywrightFormElementOptions = {},
  ) {
    this.timeout = opts.timeoutMs ?? DEFAULT_ELEMENT_TIMEOUT_MS;
    this.formFillId = opts.formFillId;
  }

  async snapshot(): Promise<ElementSnapshot> {
    const raw: unknown = await this.locator.evaluate(SNAPSHOT_SCRIPT, undefined, { timeout: this.timeout });
    return normalizeSnapshot(raw);
  }

  async fill(value: string): Promise<void> {
    await this.locator.fill(value, { timeout: this.timeout });
  }

  async selectOption(label: string): Promise<void> {
    await this.locator.selectOption({ label }, { timeout: this.timeout });
  }

  async setChecked(checked: boolean): Promise<void> {
    await this.locator.setChecked(checked, { timeout: this.timeout });
  }

  async click(): Promise<void> {
    await this.locator.click({ timeout: this.timeout });
  }

  async setInputFiles(filePath: string): Promise<void> {
    await this.locator.setInputFiles(filePath, { timeout: this.timeout });
  }

  choice(index: number): PlaywrightFormElement {
    const locator =
      this.formFillId === undefined
        ? this.locator.locator(CHOICE_SELECTOR).nth(index)
        : this.locator.page().locator(`[${CHOICE_ATTR}="${this.formFillId}:${index}"]`);
    return new PlaywrightFormElement(locator, { timeoutMs: this.timeout });
  }
}
