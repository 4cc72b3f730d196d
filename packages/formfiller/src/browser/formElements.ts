import type { Page } from 'playwright-core';
import { z } from 'zod';
import { DEFAULT_ELEMENT_TIMEOUT_MS } from '../config/constants.js';
import { getLogger } from '../monitoring/logger.js';
import {
  CHOICE_ATTR,
  CHOICE_SELECTOR,
  FORM_FILL_ATTR,
  GROUP_SELECTOR,
  PlaywrightFormElement,
} from './PlaywrightFormElement.js';

export interface CollectOptions {
  /** Only collect controls inside the first element matching this selector. */
  selector?: string;
  timeoutMs?: number;
}

const CONTROL_SELECTOR = `input, textarea, select, ${GROUP_SELECTOR}`;
const SKIPPED_INPUT_TYPES = ['hidden', 'submit', 'button', 'reset', 'image'];

/**
 * Page script: tag every fillable control with its DOM-order index and
 * return the count. Radio and checkbox inputs inside a group are tagged as
 * choices of that group instead of as controls of their own.
 */
function buildCollectScript(selector: string | undefined): string {
  return `(() => {
    var FORM_FILL_ATTR = ${JSON.stringify(FORM_FILL_ATTR)};
    var CHOICE_ATTR = ${JSON.stringify(CHOICE_ATTR)};
    var GROUP = ${JSON.stringify(GROUP_SELECTOR)};
    var CHOICE = ${JSON.stringify(CHOICE_SELECTOR)};
    var CONTROLS = ${JSON.stringify(CONTROL_SELECTOR)};
    var SKIPPED = ${JSON.stringify(SKIPPED_INPUT_TYPES)};
    var selector = ${JSON.stringify(selector ?? null)};

    document.querySelectorAll('[' + FORM_FILL_ATTR + '], [' + CHOICE_ATTR + ']').forEach(function (el) {
      el.removeAttribute(FORM_FILL_ATTR);
      el.removeAttribute(CHOICE_ATTR);
    });

    var root = selector ? document.querySelector(selector) : document;
    if (!root) return 0;

    var owners = new Map();
    root.querySelectorAll(CHOICE).forEach(function (input) {
      var group = input.closest(GROUP);
      if (!group || (root !== document && !root.contains(group))) return;
      if (!owners.has(group)) owners.set(group, []);
      owners.get(group).push(input);
    });

    var count = 0;
    root.querySelectorAll(CONTROLS).forEach(function (el) {
      if (el.matches(GROUP)) {
        var members = owners.get(el);
        if (!members) return;
        var id = String(count++);
        el.setAttribute(FORM_FILL_ATTR, id);
        members.forEach(function (input, i) { input.setAttribute(CHOICE_ATTR, id + ':' + i); });
        return;
      }
      if (el.disabled) return;
      var type = (el.getAttribute('type') || '').toLowerCase();
      if (el.tagName === 'INPUT' && SKIPPED.indexOf(type) !== -1) return;
      if (el.matches(CHOICE) && el.hasAttribute(CHOICE_ATTR)) return;
      el.setAttribute(FORM_FILL_ATTR, String(count++));
    });
    return count;
  })()`;
}

/**
 * Collect the page's form controls in DOM order as FormElementHandles.
 * Previous markers are cleared, so collecting twice is safe.
 */
export async function collectFormElements(page: Page, opts: CollectOptions = {}): Promise<PlaywrightFormElement[]> {
  const logger = getLogger().child({ component: 'collectFormElements' });
  const timeoutMs = opts.timeoutMs ?? DEFAULT_ELEMENT_TIMEOUT_MS;

  const raw: unknown = await page.evaluate(buildCollectScript(opts.selector));
  const count = z.number().int().nonnegative().parse(raw);
  if (count === 0 && opts.selector) {
    logger.warn('No form controls found', { selector: opts.selector });
  }

  return Array.from({ length: count }, (_, index) => {
    const id = String(index);
    return new PlaywrightFormElement(page.locator(`[${FORM_FILL_ATTR}="${id}"]`), { timeoutMs, formFillId: id });
  });
}
