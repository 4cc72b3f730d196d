/**
 * FormFiller: per-element pipeline and single-page pass.
 *
 * For each control: snapshot → classify → field name → KnownData match →
 * resume-grounded generation on a miss → fill. Every element ends in a
 * FieldResult; one bad element never stops the pass.
 *
 *   const filler = await createFormFiller(config);
 *   const report = await filler.fillPage(page, { first_name: 'Ada', email: 'ada@example.com' });
 */

import path from 'node:path';
import type { Page } from 'playwright-core';
import { collectFormElements } from '../browser/formElements.js';
import { DEFAULT_ELEMENT_TIMEOUT_MS } from '../config/constants.js';
import {
  ElementNotInteractableError,
  FormFillingError,
  GenerationError,
  NoFieldNameError,
  errorMessage,
} from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { loadResumeFile } from '../resume/loadResume.js';
import { EMPTY_RESUME, type ResumeContext } from '../resume/types.js';
import type { ContentGenerator } from './ContentGenerator.js';
import { classifyElement } from './ElementClassifier.js';
import { ElementFiller, RADIO_NONE, radioLabels, type FillOutcome } from './ElementFiller.js';
import { resolveFieldName } from './FieldNameResolver.js';
import { RESUME_PATH_KEY, ValueResolver } from './ValueResolver.js';
import type {
  ElementKind,
  ElementSnapshot,
  FieldDescriptor,
  FieldResult,
  FillReport,
  FillState,
  FormElementHandle,
  KnownData,
  ResolvedValue,
} from './types.js';

export interface FormFillerOptions {
  contentGenerator: ContentGenerator;
  resume?: ResumeContext;
  valueResolver?: ValueResolver;
  elementFiller?: ElementFiller;
  /** Loads a resume named by a `resume_path` KnownData entry. */
  loadResume?: (filePath: string) => Promise<ResumeContext>;
  /** Upload fallback for file inputs when the resume was given inline. */
  resumePath?: string;
  /** Base directory for relative `resume_path` entries. Defaults to the process cwd. */
  cwd?: string;
  elementTimeoutMs?: number;
  logger?: Logger;
}

export interface FillElementOptions {
  /** Overrides the name derived from the element's attributes. */
  fieldName?: string;
  index?: number;
}

export interface FillPageOptions {
  /** Restrict collection to controls inside this selector. */
  selector?: string;
}

const STATE_BY_PROVENANCE: Record<ResolvedValue['provenance'], FillState> = {
  matched: 'matched',
  generated: 'generated',
  default: 'defaulted',
};

function toFieldError(err: unknown): NonNullable<FieldResult['error']> {
  if (err instanceof FormFillingError) return { code: err.code, message: err.message };
  return { code: 'generation_failed', message: errorMessage(err) };
}

export function summarize(results: FieldResult[]): FillReport {
  return {
    results,
    filled: results.filter((r) => r.status === 'filled').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
    failed: results.filter((r) => r.status === 'failed').length,
  };
}

export class FormFiller {
  private readonly contentGenerator: ContentGenerator;
  private readonly valueResolver: ValueResolver;
  private readonly elementFiller: ElementFiller;
  private readonly loadResume: (filePath: string) => Promise<ResumeContext>;
  private readonly resumePath?: string;
  private readonly cwd: string;
  private readonly elementTimeoutMs: number;
  private readonly logger: Logger;
  private resumeContext: ResumeContext;

  constructor(opts: FormFillerOptions) {
    this.logger = opts.logger ?? getLogger().child({ component: 'FormFiller' });
    this.contentGenerator = opts.contentGenerator;
    this.valueResolver = opts.valueResolver ?? new ValueResolver();
    this.elementFiller = opts.elementFiller ?? new ElementFiller({ logger: this.logger });
    this.cwd = opts.cwd ?? process.cwd();
    this.loadResume =
      opts.loadResume ?? ((filePath) => loadResumeFile(filePath, { cwd: this.cwd, logger: this.logger }));
    this.resumePath = opts.resumePath;
    this.elementTimeoutMs = opts.elementTimeoutMs ?? DEFAULT_ELEMENT_TIMEOUT_MS;
    this.resumeContext = opts.resume ?? EMPTY_RESUME;
  }

  get resume(): ResumeContext {
    return this.resumeContext;
  }

  /** Replace the session resume; cached answers from the old one are dropped. */
  async useResumeFile(filePath: string): Promise<ResumeContext> {
    this.resumeContext = await this.loadResume(filePath);
    this.contentGenerator.clearCache();
    return this.resumeContext;
  }

  // ── Public API ──────────────────────────────────────────────────────

  async fillElement(
    handle: FormElementHandle,
    knownData: KnownData,
    opts: FillElementOptions = {},
  ): Promise<FieldResult> {
    await this.syncResume(knownData);
    return this.processElement(handle, knownData, opts.index ?? 0, opts.fieldName);
  }

  async fillElements(handles: readonly FormElementHandle[], knownData: KnownData): Promise<FillReport> {
    await this.syncResume(knownData);

    const results: FieldResult[] = [];
    for (const [index, handle] of handles.entries()) {
      results.push(await this.processElement(handle, knownData, index));
    }

    const report = summarize(results);
    this.logger.info('Form pass complete', {
      total: results.length,
      filled: report.filled,
      skipped: report.skipped,
      failed: report.failed,
    });
    return report;
  }

  async fillPage(page: Page, knownData: KnownData, opts: FillPageOptions = {}): Promise<FillReport> {
    const handles = await collectFormElements(page, {
      selector: opts.selector,
      timeoutMs: this.elementTimeoutMs,
    });
    this.logger.info('Collected form controls', { url: page.url(), count: handles.length });
    return this.fillElements(handles, knownData);
  }

  // ── Pipeline ────────────────────────────────────────────────────────

  private async syncResume(knownData: KnownData): Promise<void> {
    const requested = knownData[RESUME_PATH_KEY];
    if (typeof requested !== 'string' || requested.trim() === '') return;
    if (path.resolve(this.cwd, requested) === this.resumeContext.path) return;

    this.logger.info('Switching resume', { path: requested });
    await this.useResumeFile(requested);
  }

  private async processElement(
    handle: FormElementHandle,
    knownData: KnownData,
    index: number,
    fieldNameOverride?: string,
  ): Promise<FieldResult> {
    let snapshot: ElementSnapshot;
    try {
      snapshot = await handle.snapshot();
    } catch (err) {
      const error = new ElementNotInteractableError(fieldNameOverride ?? `#${index}`, err);
      return this.record({
        index,
        fieldName: fieldNameOverride ?? '',
        kind: 'text',
        state: 'fill_failed',
        status: 'failed',
        error: toFieldError(error),
      });
    }

    const kind = classifyElement(snapshot);
    const fieldName = fieldNameOverride?.trim() || resolveFieldName(snapshot);
    if (!fieldName) {
      const error = new NoFieldNameError({ index, kind });
      return this.record({ index, fieldName, kind, state: 'skipped', status: 'skipped', error: toFieldError(error) });
    }

    let resolved: ResolvedValue | undefined;
    try {
      resolved = await this.resolveValue(kind, fieldName, snapshot, knownData);
    } catch (err) {
      return this.record({ index, fieldName, kind, state: 'fill_failed', status: 'failed', error: toFieldError(err) });
    }

    if (!resolved) {
      return this.record({ index, fieldName, kind, state: 'skipped', status: 'skipped' });
    }

    const base = { index, fieldName, kind, value: resolved };
    this.logger.debug('Value resolved', {
      fieldName,
      kind,
      state: STATE_BY_PROVENANCE[resolved.provenance],
      key: resolved.key,
      score: resolved.score,
    });

    let outcome: FillOutcome;
    try {
      outcome = await this.elementFiller.fill(kind, { handle, snapshot, fieldName }, resolved.value);
    } catch (err) {
      return this.record({ ...base, state: 'fill_failed', status: 'failed', error: toFieldError(err) });
    }
    if (outcome === 'unchanged') {
      return this.record({ ...base, state: 'skipped', status: 'skipped' });
    }
    return this.record({ ...base, state: 'filled', status: 'filled' });
  }

  /** Matched value, default, or generated answer; undefined means nothing to fill. */
  private async resolveValue(
    kind: ElementKind,
    fieldName: string,
    snapshot: ElementSnapshot,
    knownData: KnownData,
  ): Promise<ResolvedValue | undefined> {
    if (kind === 'file') {
      return this.valueResolver.resolveFile(fieldName, knownData, this.resumeContext.path ?? this.resumePath);
    }

    const match = this.valueResolver.resolve(fieldName, knownData);
    if (match.matched) {
      return { value: match.value, provenance: 'matched', key: match.key, score: match.score };
    }
    this.logger.debug('No known value matches field', {
      fieldName,
      kind,
      bestKey: match.bestKey,
      bestScore: match.bestScore,
    });

    if (kind === 'checkbox') return { value: 'false', provenance: 'default' };

    const descriptor = this.describe(kind, fieldName, snapshot);
    if (!descriptor) return undefined;

    try {
      const value = await this.contentGenerator.generate(descriptor, this.resumeContext);
      return { value, provenance: 'generated' };
    } catch (err) {
      if (err instanceof FormFillingError) throw err;
      throw new GenerationError(`Generation failed for field "${fieldName}"`, { fieldName, kind }, err);
    }
  }

  /** Descriptor for generation, or undefined when the control takes no generated answer. */
  private describe(kind: ElementKind, fieldName: string, snapshot: ElementSnapshot): FieldDescriptor | undefined {
    switch (kind) {
      case 'select':
        return { name: fieldName, kind, options: (snapshot.options ?? []).filter((o) => o.trim() !== '') };
      case 'radio': {
        const label = radioLabels(snapshot)[0] ?? fieldName;
        return { name: fieldName, kind, options: [label, RADIO_NONE] };
      }
      case 'fieldset': {
        const choices = snapshot.choices ?? [];
        if (choices.length === 0 || choices.every((c) => c.kind === 'checkbox')) return undefined;
        return { name: fieldName, kind, options: choices.map((c) => c.label) };
      }
      default:
        return { name: fieldName, kind };
    }
  }

  private record(result: FieldResult): FieldResult {
    const data = {
      index: result.index,
      fieldName: result.fieldName,
      kind: result.kind,
      state: result.state,
      status: result.status,
      provenance: result.value?.provenance,
    };
    if (result.status === 'failed') {
      this.logger.warn('Field failed', { ...data, error: result.error?.message, code: result.error?.code });
    } else if (result.status === 'skipped') {
      const reason = result.error?.code ?? (result.value ? 'unchanged' : 'no_value');
      this.logger.info('Field skipped', { ...data, reason });
    } else {
      this.logger.info('Field filled', data);
    }
    return result;
  }
}
