import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import { IncompleteExtractionError } from '../src/agents/errors';
import { FieldTracker, hasValue } from '../src/extraction/fieldTracker';
import { PAPER_SUMMARY_TASK } from '../src/extraction/tasks';
import type { ExtractionTask } from '../src/extraction/types';

describe('hasValue', () => {
  it('treats null, blanks and empty lists as absent', () => {
    expect(hasValue(null)).toBe(false);
    expect(hasValue(undefined)).toBe(false);
    expect(hasValue('   ')).toBe(false);
    expect(hasValue([])).toBe(false);
    expect(hasValue(['', ' '])).toBe(false);
    expect(hasValue(['A. Author'])).toBe(true);
    expect(hasValue('x')).toBe(true);
    expect(hasValue(0)).toBe(true);
  });
});

describe('FieldTracker', () => {
  it('starts with every required field missing', () => {
    const tracker = new FieldTracker(PAPER_SUMMARY_TASK);
    expect(tracker.missingFields()).toEqual(['authors', 'title', 'abstract']);
    expect(tracker.isComplete()).toBe(false);
  });

  it('keeps the first value written (first-write-wins)', () => {
    const tracker = new FieldTracker(PAPER_SUMMARY_TASK);
    expect(tracker.merge({ title: 'A' })).toEqual(['title']);
    expect(tracker.merge({ title: 'B', authors: ['Jane Doe'] })).toEqual(['authors']);
    expect(tracker.snapshot()).toEqual({ title: 'A', authors: ['Jane Doe'] });
  });

  it('ignores empty values', () => {
    const tracker = new FieldTracker(PAPER_SUMMARY_TASK);
    expect(tracker.merge({ title: '', authors: [], abstract: '  ' })).toEqual([]);
    expect(tracker.filledFields()).toEqual([]);
  });

  it('never loses a filled field across merges', () => {
    const tracker = new FieldTracker(PAPER_SUMMARY_TASK);
    const responses = [{ title: 'T' }, {}, { abstract: 'Abs' }, { title: '' }, { authors: ['X'] }];
    let previous: string[] = [];
    for (const response of responses) {
      tracker.merge(response);
      const filled = tracker.filledFields();
      expect(filled).toEqual(expect.arrayContaining(previous));
      previous = filled;
    }
    expect(tracker.isComplete()).toBe(true);
  });

  it('finalize returns the record once complete', () => {
    const tracker = new FieldTracker(PAPER_SUMMARY_TASK);
    tracker.merge({ authors: ['Jane Doe', 'John Roe'], title: 'Cervical abscess in a heifer', abstract: 'A case report.' });
    expect(tracker.finalize()).toEqual({
      authors: ['Jane Doe', 'John Roe'],
      title: 'Cervical abscess in a heifer',
      abstract: 'A case report.',
    });
  });

  it('finalize throws IncompleteExtractionError naming the missing fields', () => {
    const tracker = new FieldTracker(PAPER_SUMMARY_TASK);
    tracker.merge({ title: 'Only a title' });
    expect(() => tracker.finalize()).toThrow(IncompleteExtractionError);
    try {
      tracker.finalize();
    } catch (error) {
      expect(error).toBeInstanceOf(IncompleteExtractionError);
      if (error instanceof IncompleteExtractionError) {
        expect(error.missingFields).toEqual(['authors', 'abstract']);
      }
    }
  });

  it('optional fields never block completion', () => {
    const schema = z.object({ title: z.string(), doi: z.string().optional() });
    const task: Pick<ExtractionTask<z.infer<typeof schema>>, 'name' | 'schema' | 'fields'> = {
      name: 'WithOptional',
      schema,
      fields: [
        { name: 'title', label: 'Title', required: true },
        { name: 'doi', label: 'DOI', required: false },
      ],
    };
    const tracker = new FieldTracker(task);
    expect(tracker.unsetFields()).toEqual(['title', 'doi']);
    expect(tracker.missingFields()).toEqual(['title']);

    tracker.merge({ title: 'T' });
    expect(tracker.isComplete()).toBe(true);
    expect(tracker.unsetFields()).toEqual(['doi']);
    expect(tracker.finalize()).toEqual({ title: 'T' });
  });
});
