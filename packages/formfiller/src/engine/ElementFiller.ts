/**
 * ElementFiller: applies a resolved value to one control.
 *
 * Each ElementKind maps to one fill routine. Browser failures surface as
 * ElementNotInteractableError; engine errors (missing upload file, no
 * matching choice) pass through unchanged.
 */

import { DEFAULT_FUZZY_MATCH_THRESHOLD } from '../config/constants.js';
import { ElementNotInteractableError, FormFillingError, NoMatchFoundError } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { FileHandler } from './FileHandler.js';
import { findBestMatch } from './similarity.js';
import type { ChoiceSnapshot, ElementKind, ElementSnapshot, FormElementHandle } from './types.js';

export interface FillTarget {
  handle: FormElementHandle;
  snapshot: ElementSnapshot;
  fieldName: string;
}

/** `unchanged` means the routine deliberately left the control as it was. */
export type FillOutcome = 'applied' | 'unchanged';

export type FillRoutine = (target: FillTarget, value: string) => Promise<FillOutcome>;

export interface ElementFillerOptions {
  fileHandler?: FileHandler;
  fuzzyMatchThreshold?: number;
  logger?: Logger;
}

/** Values that check a checkbox; everything else unchecks it. */
export const CHECKED_VALUES: ReadonlySet<string> = new Set(['true', 'yes', '1', 'on', 'checked', 'y']);

/** Answer meaning "leave this radio alone". */
export const RADIO_NONE = 'None';

export function isCheckedValue(value: string): boolean {
  return CHECKED_VALUES.has(value.trim().toLowerCase());
}

export function isRadioSelection(value: string): boolean {
  const trimmed = value.trim();
  return trimmed !== '' && trimmed.toLowerCase() !== RADIO_NONE.toLowerCase();
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function choiceMatches(choice: ChoiceSnapshot, value: string): boolean {
  return sameText(choice.label, value) || sameText(choice.value, value);
}

/** Texts that identify a lone radio: aria-label, value attribute and label texts. */
export function radioLabels(snapshot: ElementSnapshot): string[] {
  return [snapshot.attributes['aria-label'], snapshot.attributes.value, snapshot.labelText, snapshot.labelledByText]
    .filter((text): text is string => text !== undefined && text.trim() !== '');
}

export class ElementFiller {
  private readonly fileHandler: FileHandler;
  private readonly threshold: number;
  private readonly logger: Logger;
  private readonly routines: Record<ElementKind, FillRoutine>;

  constructor(opts: ElementFillerOptions = {}) {
    this.logger = opts.logger ?? getLogger().child({ component: 'ElementFiller' });
    this.fileHandler = opts.fileHandler ?? new FileHandler({ logger: this.logger });
    this.threshold = opts.fuzzyMatchThreshold ?? DEFAULT_FUZZY_MATCH_THRESHOLD;

    const fillText: FillRoutine = async ({ handle }, value) => {
      await handle.fill(value);
      return 'applied';
    };
    this.routines = {
      text: fillText,
      email: fillText,
      tel: fillText,
      url: fillText,
      search: fillText,
      password: fillText,
      textarea: fillText,
      select: (target, value) => this.fillSelect(target, value),
      radio: (target, value) => this.fillRadio(target, value),
      checkbox: async ({ handle }, value) => {
        await handle.setChecked(isCheckedValue(value));
        return 'applied';
      },
      fieldset: (target, value) => this.fillFieldset(target, value),
      file: async ({ handle }, value) => {
        await this.fileHandler.upload(handle, value);
        return 'applied';
      },
    };
  }

  async fill(kind: ElementKind, target: FillTarget, value: string): Promise<FillOutcome> {
    let outcome: FillOutcome;
    try {
      outcome = await this.routines[kind](target, value);
    } catch (err) {
      if (err instanceof FormFillingError) throw err;
      throw new ElementNotInteractableError(target.fieldName, err, { kind });
    }
    this.logger.debug(outcome === 'applied' ? 'Element filled' : 'Element left unchanged', {
      fieldName: target.fieldName,
      kind,
    });
    return outcome;
  }

  // ── Routines ────────────────────────────────────────────────────────

  private async fillSelect({ handle, snapshot, fieldName }: FillTarget, value: string): Promise<FillOutcome> {
    const options = (snapshot.options ?? []).filter((option) => option.trim() !== '');
    if (options.length === 0) {
      await handle.selectOption(value);
      return 'applied';
    }

    let option = options.find((candidate) => candidate === value) ?? options.find((candidate) => sameText(candidate, value));
    if (option === undefined) {
      const closest = findBestMatch(value, options, (candidate) => candidate);
      if (closest && closest.score >= this.threshold) option = closest.item;
    }
    if (option === undefined) {
      throw new NoMatchFoundError(fieldName, { value, options });
    }
    await handle.selectOption(option);
    return 'applied';
  }

  /**
   * A lone radio is clicked only when the value names it. Without any label
   * of its own, an affirmative value or the field name selects it.
   */
  private async fillRadio({ handle, snapshot, fieldName }: FillTarget, value: string): Promise<FillOutcome> {
    const labels = radioLabels(snapshot);
    const selected =
      isRadioSelection(value) &&
      (labels.length > 0
        ? labels.some((label) => sameText(label, value))
        : isCheckedValue(value) || sameText(fieldName, value));
    if (!selected) {
      this.logger.debug('Radio left unselected', { fieldName, value });
      return 'unchanged';
    }
    await handle.click();
    return 'applied';
  }

  private async fillFieldset(target: FillTarget, value: string): Promise<FillOutcome> {
    const choices = target.snapshot.choices ?? [];
    if (choices.length > 0 && choices.every((choice) => choice.kind === 'checkbox')) {
      await this.fillCheckboxGroup(target, choices, value);
    } else {
      await this.fillRadioGroup(target, choices, value);
    }
    return 'applied';
  }

  private async fillRadioGroup({ handle, fieldName }: FillTarget, choices: ChoiceSnapshot[], value: string): Promise<void> {
    let index = choices.findIndex((choice) => choiceMatches(choice, value));
    if (index === -1) {
      const best = findBestMatch(value, choices, (choice) => choice.label);
      if (best && best.score >= this.threshold) index = choices.indexOf(best.item);
    }
    if (index === -1) {
      throw new NoMatchFoundError(fieldName, { value, choices: choices.map((choice) => choice.label) });
    }
    await handle.choice(index).click();
  }

  private async fillCheckboxGroup(
    { handle, fieldName }: FillTarget,
    choices: ChoiceSnapshot[],
    value: string,
  ): Promise<void> {
    const wanted = value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part !== '');

    const indices = new Set<number>();
    for (const item of wanted) {
      const best = findBestMatch(item, choices, (choice) => choice.label);
      if (best && best.score >= this.threshold) indices.add(choices.indexOf(best.item));
    }
    if (indices.size === 0) {
      throw new NoMatchFoundError(fieldName, { value, choices: choices.map((choice) => choice.label) });
    }

    for (const index of [...indices].sort((a, b) => a - b)) {
      await handle.choice(index).setChecked(true);
    }
  }
}
