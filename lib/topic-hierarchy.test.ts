import { describe, it, expect } from 'vitest';
import {
  assertAcyclic,
  buildTopicHierarchy,
  findPrerequisiteCycle,
  isQuestionWorthy,
  normalizeProposal,
  titleSignature,
  validateProposal,
} from '@/lib/topic-hierarchy';
import type { TopicProposal } from '@/lib/schema';
import { GenerationError, HierarchyValidationError, PrerequisiteCycleError, type HierarchyIssue } from '@/lib/study-errors';

const leaf = (title: string, extra: { prerequisites?: string[] } = {}) => ({
  title,
  description: `Core ideas of ${title.toLowerCase()} explained.`,
  ...extra,
});

describe('titleSignature', () => {
  it('folds case, punctuation and stopwords', () => {
    expect(titleSignature('The Krebs Cycle')).toBe('cycle krebs');
    expect(titleSignature('Cycle, Krebs')).toBe('cycle krebs');
  });
});

describe('isQuestionWorthy', () => {
  it('rejects filler titles and thin descriptions', () => {
    expect(isQuestionWorthy({ title: 'Misc', description: 'Various remaining notes and facts' })).toBe(false);
    expect(isQuestionWorthy({ title: 'Osmosis', description: 'Water moves' })).toBe(false);
    expect(isQuestionWorthy(leaf('Osmosis'))).toBe(true);
  });
});

describe('findPrerequisiteCycle', () => {
  it('returns the loop with its first node repeated', () => {
    const graph = new Map([
      ['a', ['b']],
      ['b', ['c']],
      ['c', ['a']],
    ]);
    expect(findPrerequisiteCycle(graph)).toEqual(['a', 'b', 'c', 'a']);
    expect(() => assertAcyclic(graph)).toThrow(PrerequisiteCycleError);
  });

  it('accepts a diamond', () => {
    const graph = new Map([
      ['d', ['b', 'c']],
      ['b', ['a']],
      ['c', ['a']],
      ['a', []],
    ]);
    expect(findPrerequisiteCycle(graph)).toBeNull();
  });
});

describe('validateProposal', () => {
  it('reports duplicate siblings', () => {
    const issues = validateProposal({
      categories: [{ title: 'Biology', subtopics: [leaf('The Cell'), leaf('Cell')] }],
    });
    expect(issues).toEqual([
      { kind: 'duplicate_sibling', path: 'Biology > Cell', message: '"Cell" repeats its sibling "The Cell"' },
    ]);
  });

  it('reports nesting past three levels', () => {
    const issues = validateProposal({
      categories: [
        { title: 'Unit', subtopics: [{ title: 'Chapter', subtopics: [{ ...leaf('Section'), subtopics: [leaf('Paragraph')] }] }] },
      ],
    });
    expect(issues.map((i) => [i.kind, i.path])).toEqual([['too_deep', 'Unit > Chapter > Section']]);
  });

  it('reports prerequisite loops between leaves', () => {
    const issues = validateProposal({
      categories: [leaf('Alpha Topic', { prerequisites: ['Beta Topic'] }), leaf('Beta Topic', { prerequisites: ['alpha topic'] })],
    });
    expect(issues.map((i) => i.kind)).toEqual(['prerequisite_cycle']);
  });
});

describe('normalizeProposal', () => {
  it('lays out drafts in pre-order and resolves prerequisites', () => {
    const drafts = normalizeProposal({
      categories: [
        {
          title: 'Energy',
          description: 'How cells get energy',
          subtopics: [leaf('Glycolysis'), leaf('Krebs Cycle', { prerequisites: ['glycolysis'] }), leaf('The Glycolysis')],
        },
        leaf('Genetics Basics'),
      ],
    });

    expect(drafts.map((d) => [d.key, d.title, d.isCategory, d.depth, d.parentKey])).toEqual([
      ['t1', 'Energy', true, 1, null],
      ['t2', 'Glycolysis', false, 2, 't1'],
      ['t3', 'Krebs Cycle', false, 2, 't1'],
      ['t4', 'Genetics Basics', false, 1, null],
    ]);
    expect(drafts.map((d) => d.position)).toEqual([
      { x: 0, y: 0 },
      { x: 280, y: 120 },
      { x: 280, y: 240 },
      { x: 0, y: 360 },
    ]);
    expect(drafts[2]?.prerequisiteKeys).toEqual(['t2']);
  });

  it('folds levels below the cap into the leaf description', () => {
    const drafts = normalizeProposal({
      categories: [
        {
          title: 'Cat',
          subtopics: [
            {
              title: 'Sub',
              subtopics: [{ title: 'Deep leaf', description: 'Deep desc', subtopics: [{ title: 'Deeper' }] }],
            },
          ],
        },
      ],
    });
    expect(drafts.map((d) => d.title)).toEqual(['Cat', 'Sub', 'Deep leaf']);
    expect(drafts[2]?.description).toBe('Deep desc Covers: Deeper.');
    expect(drafts[2]?.isCategory).toBe(false);
  });

  it('breaks prerequisite cycles by dropping the closing edge', () => {
    const drafts = normalizeProposal({
      categories: [leaf('Alpha Topic', { prerequisites: ['Beta Topic'] }), leaf('Beta Topic', { prerequisites: ['Alpha Topic'] })],
    });
    expect(drafts.map((d) => d.prerequisiteKeys)).toEqual([['t2'], []]);
  });
});

describe('buildTopicHierarchy', () => {
  const clean: TopicProposal = { title: 'Biology', categories: [leaf('Osmosis'), leaf('Diffusion')] };
  const flawed: TopicProposal = { categories: [leaf('Osmosis'), { title: 'Misc', description: 'Everything else in the chapter' }] };

  it('re-asks with the previous issues until a proposal validates', async () => {
    const seen: HierarchyIssue[][] = [];
    const replies = [flawed, clean];
    const result = await buildTopicHierarchy(
      async (previous) => {
        seen.push(previous);
        const next = replies.shift();
        if (!next) throw new Error('no reply left');
        return next;
      },
      { maxAttempts: 3 }
    );

    expect(result.attempts).toBe(2);
    expect(result.issues).toEqual([]);
    expect(result.title).toBe('Biology');
    expect(seen.map((s) => s.map((i) => i.kind))).toEqual([[], ['not_question_worthy']]);
  });

  it('accepts the best proposal once attempts run out', async () => {
    const result = await buildTopicHierarchy(async () => flawed, { maxAttempts: 2 });
    expect(result.attempts).toBe(2);
    expect(result.issues).toHaveLength(1);
    expect(result.topics.map((t) => t.title)).toEqual(['Osmosis', 'Misc']);
  });

  it('keeps the first proposal when a retry fails to generate', async () => {
    let calls = 0;
    const result = await buildTopicHierarchy(
      async () => {
        calls += 1;
        if (calls === 1) return flawed;
        throw new GenerationError('down', []);
      },
      { maxAttempts: 2 }
    );
    expect(result.topics).toHaveLength(2);
    expect(result.title).toBeNull();
  });

  it('propagates a failure of the first request', async () => {
    await expect(
      buildTopicHierarchy(async () => {
        throw new GenerationError('down', []);
      }, { maxAttempts: 2 })
    ).rejects.toBeInstanceOf(GenerationError);
  });

  it('drops duplicate siblings from an accepted proposal', async () => {
    await expect(
      buildTopicHierarchy(async () => ({ categories: [leaf('Only'), leaf('only')] }), { maxAttempts: 1 })
    ).resolves.toMatchObject({ topics: [{ title: 'Only' }] });
  });

  it('rejects a tree without any leaf', async () => {
    await expect(buildTopicHierarchy(async () => ({ categories: [] }), { maxAttempts: 1 })).rejects.toBeInstanceOf(
      HierarchyValidationError
    );
  });
});
