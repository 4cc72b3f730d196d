import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import { ElementFiller, isCheckedValue } from '../../../src/engine/ElementFiller.js';
import { FileHandler } from '../../../src/engine/FileHandler.js';
import type { ChoiceSnapshot, ElementKind, ElementSnapshot } from '../../../src/engine/types.js';
import { ElementNotInteractableError, FileNotFoundError, NoMatchFoundError } from '../../../src/errors.js';
import { fakeElement, makeSnapshot, quietLogger, type FakeElement } from '../../fixtures/formFakes.js';

function choice(kind: ChoiceSnapshot['kind'], label: string): ChoiceSnapshot {
  return { kind, label, value: label.toLowerCase(), checked: false };
}

function group(kind: ChoiceSnapshot['kind'], labels: string[]): { element: FakeElement; members: FakeElement[] } {
  const choices = labels.map((label) => choice(kind, label));
  const members = choices.map(() => fakeElement(makeSnapshot({ type: kind })));
  const element = fakeElement(makeSnapshot({ tag: 'fieldset', choices }), members);
  return { element, members };
}

describe('ElementFiller', () => {
  let tmpDir: string;
  let filler: ElementFiller;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'element-filler-'));
    fs.writeFileSync(path.join(tmpDir, 'resume.pdf'), 'pdf');
    const logger = quietLogger();
    filler = new ElementFiller({ fileHandler: new FileHandler({ cwd: tmpDir, logger }), logger });
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function fill(kind: ElementKind, element: FakeElement, value: string, snapshot?: ElementSnapshot) {
    return filler.fill(kind, { handle: element, snapshot: snapshot ?? (await element.snapshot()), fieldName: 'field' }, value);
  }

  // ── Text-like ─────────────────────────────────────────────────────────

  test.each(['text', 'email', 'tel', 'url', 'search', 'password', 'textarea'] as const)('%s uses fill()', async (kind) => {
    const element = fakeElement(makeSnapshot());
    await fill(kind, element, 'Ada');
    expect(element.fill).toHaveBeenCalledWith('Ada');
  });

  // ── Select ────────────────────────────────────────────────────────────

  describe('select', () => {
    const snapshot = makeSnapshot({ tag: 'select', options: ['Canada', 'United States'] });

    test('selects an exact label', async () => {
      const element = fakeElement(snapshot);
      await fill('select', element, 'Canada');
      expect(element.selectOption).toHaveBeenCalledWith('Canada');
    });

    test('matches labels case-insensitively', async () => {
      const element = fakeElement(snapshot);
      await fill('select', element, 'canada');
      expect(element.selectOption).toHaveBeenCalledWith('Canada');
    });

    test('falls back to the closest option', async () => {
      const element = fakeElement(snapshot);
      await fill('select', element, 'United States of America');
      expect(element.selectOption).toHaveBeenCalledWith('United States');
    });

    test('an option below the threshold fails without selecting', async () => {
      const element = fakeElement(makeSnapshot({ tag: 'select', options: ['Canada', 'France'] }));
      const error = await fill('select', element, 'Germany').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(NoMatchFoundError);
      expect(error instanceof NoMatchFoundError && error.context).toEqual({
        fieldName: 'field',
        value: 'Germany',
        options: ['Canada', 'France'],
      });
      expect(element.selectOption).not.toHaveBeenCalled();
    });

    test('passes the value through when no options are known', async () => {
      const element = fakeElement(makeSnapshot({ tag: 'select' }));
      await fill('select', element, 'Other');
      expect(element.selectOption).toHaveBeenCalledWith('Other');
    });
  });

  // ── Radio and checkbox ───────────────────────────────────────────────

  describe('radio', () => {
    const radio = (value: string, labelText: string) =>
      fakeElement(makeSnapshot({ type: 'radio', attributes: { type: 'radio', value }, labelText }));

    test('is clicked when the value names it', async () => {
      const yes = radio('yes', 'Yes');
      await expect(fill('radio', yes, 'Yes')).resolves.toBe('applied');
      expect(yes.click).toHaveBeenCalledTimes(1);
    });

    test('is left alone when the value names a sibling', async () => {
      const no = radio('no', 'No');
      await expect(fill('radio', no, 'Yes')).resolves.toBe('unchanged');
      expect(no.click).not.toHaveBeenCalled();
    });

    test('without labels it takes an affirmative value or the field name', async () => {
      const bare = () => fakeElement(makeSnapshot({ type: 'radio' }));

      const yes = bare();
      await fill('radio', yes, 'Yes');
      expect(yes.click).toHaveBeenCalledTimes(1);

      const named = bare();
      await fill('radio', named, 'Field');
      expect(named.click).toHaveBeenCalledTimes(1);

      const other = bare();
      await expect(fill('radio', other, 'Blue')).resolves.toBe('unchanged');
      expect(other.click).not.toHaveBeenCalled();
    });

    test('"None" and empty values never select', async () => {
      const none = fakeElement(makeSnapshot({ type: 'radio' }));
      await expect(fill('radio', none, 'None')).resolves.toBe('unchanged');
      await expect(fill('radio', none, '')).resolves.toBe('unchanged');
      expect(none.click).not.toHaveBeenCalled();
    });
  });

  test.each(['true', 'yes', '1', 'on', 'checked', 'y', ' YES '])('checkbox is checked for "%s"', async (value) => {
    const element = fakeElement(makeSnapshot({ type: 'checkbox' }));
    await fill('checkbox', element, value);
    expect(element.setChecked).toHaveBeenCalledWith(true);
  });

  test.each(['false', 'no', '0', 'off', ''])('checkbox is unchecked for "%s"', async (value) => {
    const element = fakeElement(makeSnapshot({ type: 'checkbox' }));
    await fill('checkbox', element, value);
    expect(element.setChecked).toHaveBeenCalledWith(false);
  });

  test('isCheckedValue', () => {
    expect(isCheckedValue('On')).toBe(true);
    expect(isCheckedValue('nope')).toBe(false);
  });

  // ── Groups ────────────────────────────────────────────────────────────

  describe('fieldset', () => {
    test('radio group clicks the choice whose label equals the value', async () => {
      const { element, members } = group('radio', ['Yes', 'No']);
      await fill('fieldset', element, 'no');
      expect(element.choice).toHaveBeenCalledWith(1);
      expect(members[1]?.click).toHaveBeenCalledTimes(1);
      expect(members[0]?.click).not.toHaveBeenCalled();
    });

    test('radio group with no matching choice fails', async () => {
      const { element, members } = group('radio', ['Yes', 'No']);
      await expect(fill('fieldset', element, 'Maybe')).rejects.toBeInstanceOf(NoMatchFoundError);
      expect(members.every((m) => m.click.mock.calls.length === 0)).toBe(true);
    });

    test('checkbox group checks the best choice for each comma-separated value', async () => {
      const { element, members } = group('checkbox', ['Java', 'JavaScript', 'Rust']);
      await fill('fieldset', element, 'Java, Rust');
      expect(members[0]?.setChecked).toHaveBeenCalledWith(true);
      expect(members[2]?.setChecked).toHaveBeenCalledWith(true);
      expect(members[1]?.setChecked).not.toHaveBeenCalled();
    });

    test('checkbox group with no matching choice fails', async () => {
      const { element } = group('checkbox', ['Java', 'Rust']);
      await expect(fill('fieldset', element, 'Haskell')).rejects.toThrow('No known value matches field "field"');
    });
  });

  // ── Files ─────────────────────────────────────────────────────────────

  describe('file', () => {
    test('uploads an existing file by absolute path', async () => {
      const element = fakeElement(makeSnapshot({ type: 'file' }));
      await fill('file', element, 'resume.pdf');
      expect(element.setInputFiles).toHaveBeenCalledWith(path.join(tmpDir, 'resume.pdf'));
    });

    test('missing files fail before any upload', async () => {
      const element = fakeElement(makeSnapshot({ type: 'file' }));
      await expect(fill('file', element, 'missing.pdf')).rejects.toBeInstanceOf(FileNotFoundError);
      expect(element.setInputFiles).not.toHaveBeenCalled();
    });
  });

  // ── Errors ────────────────────────────────────────────────────────────

  test('browser failures become ElementNotInteractableError', async () => {
    const element = fakeElement(makeSnapshot());
    element.fill.mockRejectedValue(new Error('Timeout 5000ms exceeded'));

    const error = await fill('text', element, 'Ada').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ElementNotInteractableError);
    expect(error instanceof ElementNotInteractableError && error.message).toBe(
      'Element "field" is not interactable: Timeout 5000ms exceeded',
    );
    expect(error instanceof ElementNotInteractableError && error.code).toBe('element_not_interactable');
  });
});
