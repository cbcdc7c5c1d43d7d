import { describe, it, expect, vi } from 'vitest';
import { createAnalysisPipeline, type AnalysisRecord, type AnalysisSink, type SaveResult } from '../pipeline';
import {
  AllSectionsFailedError,
  AnalysisCancelledError,
  ClassifierPermanentError,
  EmptyDocumentError,
  InvalidInputError,
  PersistenceError,
} from '../errors';
import type { ZeroShotClient, ZeroShotRequest, ZeroShotResponse } from '../../ai/types';

/* ============= Helpers ============= */

class MemorySink implements AnalysisSink {
  records: AnalysisRecord[] = [];
  result: SaveResult | null = null;

  async save(record: AnalysisRecord): Promise<SaveResult> {
    if (this.result && !this.result.ok) return this.result;
    this.records.push(record);
    return { ok: true, id: record.id };
  }
}

function stubClient(impl: (req: ZeroShotRequest, call: number) => Promise<ZeroShotResponse>) {
  let calls = 0;
  const classify = vi.fn((req: ZeroShotRequest) => impl(req, ++calls));
  const client: ZeroShotClient = { provider: 'stub', model: 'stub-model', maxInputChars: 1000, classify };
  return { client, classify };
}

/** Scores keyed by section text */
const byText = (table: Record<string, [number, number]>) =>
  stubClient((req) => {
    const [compliant, nonCompliant] = table[req.text];
    return Promise.resolve({ labels: ['compliant', 'non-compliant'], scores: [compliant, nonCompliant] });
  });

const FIXED_NOW = () => new Date('2024-05-01T10:00:00.000Z');

/* ============= Scenarios ============= */

describe('analysis pipeline', () => {
  it('turns a 2-of-3 compliant document into a compliant report', async () => {
    const sink = new MemorySink();
    const { client, classify } = byText({ 'A. ': [0.9, 0.1], 'B. ': [0.8, 0.2], 'C.': [0.4, 0.6] });
    const pipeline = createAnalysisPipeline({
      client,
      sink,
      options: { maxSectionLength: 3 },
      generateId: () => 'doc-1',
      now: FIXED_NOW,
    });

    const { id, report } = await pipeline.analyze({ text: 'A. B. C.', source: { kind: 'text' } });

    expect(id).toBe('doc-1');
    expect(report.status).toBe('compliant');
    expect(report.confidence).toBeCloseTo(0.85, 10);
    expect(report.riskDistribution).toEqual({ high: 0, medium: 1, low: 0 });
    expect(report.sections.map((s) => [s.start, s.end])).toEqual([[0, 3], [3, 6], [6, 8]]);
    expect(report.analyzedAt).toBe('2024-05-01T10:00:00.000Z');
    expect(classify).toHaveBeenCalledTimes(3);
    expect(sink.records).toEqual([{ id: 'doc-1', report }]);
  });

  it('persists the error report and raises AllSectionsFailedError when every section fails', async () => {
    const sink = new MemorySink();
    const { client } = stubClient(() => Promise.reject(new ClassifierPermanentError('HTTP 400', { httpStatus: 400 })));
    const pipeline = createAnalysisPipeline({ client, sink, options: { maxSectionLength: 3 } });

    const err = await pipeline
      .analyze({ text: 'A. B. C.', source: { kind: 'upload', filename: 'a.txt' } })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AllSectionsFailedError);
    if (!(err instanceof AllSectionsFailedError)) return;
    expect(err.status).toBe(502);
    expect(err.report.status).toBe('error');
    expect(err.report.summary.sectionsWithErrors).toBe(3);
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0].report.status).toBe('error');
  });

  it('recovers from two timeouts within the retry budget', async () => {
    const sink = new MemorySink();
    const { client } = stubClient((req, call) =>
      call <= 2
        ? new Promise((_, reject) => req.signal?.addEventListener('abort', () => reject(new Error('aborted'))))
        : Promise.resolve({ labels: ['compliant', 'non-compliant'], scores: [0.9, 0.1] })
    );
    const pipeline = createAnalysisPipeline({
      client,
      sink,
      options: { retry: { timeoutMs: 10, maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, maxElapsedMs: 5_000 } },
      classifyOverrides: { sleep: async () => {} },
    });

    const { report } = await pipeline.analyze({ text: 'One short section.', source: { kind: 'text' } });

    expect(report.status).toBe('compliant');
    expect(report.sections[0].status).toBe('success');
    expect(report.summary.sectionsWithErrors).toBe(0);
  });

  it('rejects empty text before calling the classifier', async () => {
    const sink = new MemorySink();
    const { client, classify } = byText({});
    const pipeline = createAnalysisPipeline({ client, sink });

    await expect(pipeline.analyze({ text: '   ', source: { kind: 'text' } })).rejects.toBeInstanceOf(
      EmptyDocumentError
    );
    expect(classify).not.toHaveBeenCalled();
    expect(sink.records).toHaveLength(0);
  });

  it('raises PersistenceError when the sink refuses the record', async () => {
    const sink = new MemorySink();
    sink.result = { ok: false, error: 'disk full' };
    const pipeline = createAnalysisPipeline({ client: byText({ 'Fine.': [0.9, 0.1] }).client, sink });

    await expect(pipeline.analyze({ text: 'Fine.', source: { kind: 'text' } })).rejects.toThrow(
      new PersistenceError('Failed to persist analysis: disk full')
    );
  });

  it('does not persist a cancelled analysis', async () => {
    const sink = new MemorySink();
    const controller = new AbortController();
    controller.abort();
    const { client, classify } = byText({ 'Fine.': [0.9, 0.1] });
    const pipeline = createAnalysisPipeline({ client, sink });

    await expect(
      pipeline.analyze({ text: 'Fine.', source: { kind: 'text' }, signal: controller.signal })
    ).rejects.toBeInstanceOf(AnalysisCancelledError);
    expect(classify).not.toHaveBeenCalled();
    expect(sink.records).toHaveLength(0);
  });

  it('classifies sections concurrently up to the configured limit', async () => {
    let active = 0;
    let peak = 0;
    const { client } = stubClient(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      active -= 1;
      return { labels: ['compliant', 'non-compliant'], scores: [0.9, 0.1] };
    });
    const pipeline = createAnalysisPipeline({
      client,
      sink: new MemorySink(),
      options: { maxSectionLength: 3, concurrency: 2 },
    });

    const { report } = await pipeline.analyze({ text: 'ab cd ef gh', source: { kind: 'text' } });

    expect(report.summary.totalSections).toBe(4);
    expect(peak).toBe(2);
  });

  it('refuses identical or reserved labels', () => {
    const sink = new MemorySink();
    const { client } = byText({});
    expect(() =>
      createAnalysisPipeline({ client, sink, options: { labels: { compliant: 'ok', nonCompliant: 'ok' } } })
    ).toThrow(InvalidInputError);
    expect(() =>
      createAnalysisPipeline({ client, sink, options: { labels: { compliant: 'ok', nonCompliant: 'error' } } })
    ).toThrow(InvalidInputError);
  });

  it('trims padded labels before voting', async () => {
    const sink = new MemorySink();
    const { client } = stubClient(() =>
      Promise.resolve({ labels: ['compliant', 'non-compliant'], scores: [0.9, 0.1] })
    );
    const pipeline = createAnalysisPipeline({
      client,
      sink,
      options: { labels: { compliant: ' compliant', nonCompliant: 'non-compliant ' } },
      now: FIXED_NOW,
    });

    const { report } = await pipeline.analyze({ text: 'Short document.', source: { kind: 'text' } });

    expect(pipeline.options.labels).toEqual({ compliant: 'compliant', nonCompliant: 'non-compliant' });
    expect(report.status).toBe('compliant');
    expect(report.confidence).toBe(0.9);
  });
});
