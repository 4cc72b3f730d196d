import { describe, expect, test, vi } from 'vitest';
import { parseConfig } from '../../src/config/configuration.js';
import { createFormFiller } from '../../src/index.js';
import { ProviderRegistry } from '../../src/llm/registry.js';
import type { TextExtractor } from '../../src/resume/types.js';
import { fakeGenerator, quietLogger, textInput } from '../fixtures/formFakes.js';

describe('createFormFiller', () => {
  test('wires known data, generation and the inline resume together', async () => {
    const model = fakeGenerator('I enjoy building engines');
    const filler = await createFormFiller(parseConfig({ resumeContent: 'Ada Lovelace\nAnalyst' }), {
      generator: model,
      logger: quietLogger(),
    });

    const first = textInput('first_name');
    const motivation = textInput('motivation');
    const report = await filler.fillElements([first, motivation], { first_name: 'Ada' });

    expect(report.filled).toBe(2);
    expect(report.results.map((r) => r.state)).toEqual(['filled', 'filled']);
    expect(report.results[0]?.value).toEqual({ value: 'Ada', provenance: 'matched', key: 'first_name', score: 100 });
    expect(report.results[1]?.value).toEqual({ value: 'I enjoy building engines', provenance: 'generated' });
    expect(first.fill).toHaveBeenCalledWith('Ada');
    expect(motivation.fill).toHaveBeenCalledWith('I enjoy building engines');
    expect(model.generate.mock.calls[0]?.[0]).toContain('Ada Lovelace\nAnalyst');
    expect(filler.resume).toEqual({ text: 'Ada Lovelace\nAnalyst', source: 'inline' });
  });

  test('builds the model client from the registry', async () => {
    const factory = vi.fn(() => fakeGenerator('x'));
    const registry = new ProviderRegistry().register('openai-compatible', factory);

    await createFormFiller(parseConfig({ llm: { provider: 'ollama', model: 'llama3' } }), {
      registry,
      logger: quietLogger(),
    });

    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory.mock.calls[0]).toEqual([expect.objectContaining({ providerId: 'ollama', model: 'llama3' })]);
  });

  test('loads the configured resume file through the extractor', async () => {
    const extractor: TextExtractor = { extractText: vi.fn(async (_filePath: string) => 'Resume text') };

    const filler = await createFormFiller(parseConfig({ resumePath: '/tmp/formfill/cv.pdf' }), {
      generator: fakeGenerator(),
      extractor,
      logger: quietLogger(),
    });

    expect(filler.resume).toEqual({ text: 'Resume text', source: 'file', path: '/tmp/formfill/cv.pdf' });
  });

  test('relative resume paths resolve against deps.cwd', async () => {
    const extractText = vi.fn(async (_filePath: string) => 'Resume text');
    const filler = await createFormFiller(parseConfig({ resumePath: 'cv.pdf' }), {
      generator: fakeGenerator(),
      extractor: { extractText },
      cwd: '/data',
      logger: quietLogger(),
    });
    expect(filler.resume.path).toBe('/data/cv.pdf');

    await filler.fillElements([textInput('email')], { resume_path: 'cv.pdf' });
    expect(extractText).toHaveBeenCalledTimes(1);

    await filler.fillElements([textInput('email')], { resume_path: 'other.pdf' });
    expect(extractText).toHaveBeenLastCalledWith('/data/other.pdf');
    expect(filler.resume.path).toBe('/data/other.pdf');
  });
});
