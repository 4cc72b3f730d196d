import { vi, type Mock } from 'vitest';
import type { ElementSnapshot, FormElementHandle } from '../../src/engine/types.js';
import type { TextGenerator } from '../../src/llm/types.js';
import { Logger } from '../../src/monitoring/logger.js';

// ── Browser contract fakes ───────────────────────────────────────────────

export interface FakeElement extends FormElementHandle {
  snapshot: Mock<() => Promise<ElementSnapshot>>;
  fill: Mock<(value: string) => Promise<void>>;
  selectOption: Mock<(label: string) => Promise<void>>;
  setChecked: Mock<(checked: boolean) => Promise<void>>;
  click: Mock<() => Promise<void>>;
  setInputFiles: Mock<(filePath: string) => Promise<void>>;
  choice: Mock<(index: number) => FakeElement>;
}

export function makeSnapshot(overrides: Partial<ElementSnapshot> = {}): ElementSnapshot {
  return { tag: 'input', attributes: {}, ...overrides };
}

export function fakeElement(snapshot: ElementSnapshot, choices: FakeElement[] = []): FakeElement {
  return {
    snapshot: vi.fn(async () => snapshot),
    fill: vi.fn(async (_value: string) => {}),
    selectOption: vi.fn(async (_label: string) => {}),
    setChecked: vi.fn(async (_checked: boolean) => {}),
    click: vi.fn(async () => {}),
    setInputFiles: vi.fn(async (_filePath: string) => {}),
    choice: vi.fn((index: number) => {
      const choice = choices[index];
      if (!choice) throw new Error(`no choice at index ${index}`);
      return choice;
    }),
  };
}

/** A text input identified only by its `name` attribute. */
export function textInput(name: string, type = 'text'): FakeElement {
  return fakeElement(makeSnapshot({ type, attributes: { name, type } }));
}

// ── Model fakes ──────────────────────────────────────────────────────────

export interface FakeGenerator extends TextGenerator {
  generate: Mock<(prompt: string) => Promise<string>>;
}

export function fakeGenerator(
  answer: string | ((prompt: string) => string | Promise<string>) = 'generated answer',
): FakeGenerator {
  return {
    provider: 'fake',
    model: 'fake-model',
    generate: vi.fn(async (prompt: string) => (typeof answer === 'string' ? answer : answer(prompt))),
  };
}

// ── Logging ──────────────────────────────────────────────────────────────

/** Logger that only prints errors, keeping test output readable. */
export function quietLogger(): Logger {
  return new Logger({ level: 'error', service: 'test' });
}
