import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  CONTENT_FILES,
  createContentCatalog,
  loadContentBundle,
} from '@/modules/content/index.js';

import { makeQuestion, makeTestBundle } from '../../fixtures/builders.js';

const CONTENT_KEYS = ['quizzes', 'scenarios', 'tips', 'lessons'] as const;

const CONTENT_DIR = fileURLToPath(new URL('../../../content', import.meta.url));

describe('loadContentBundle', () => {
  it('loads the shipped content', async () => {
    const result = await loadContentBundle(CONTENT_DIR);

    const bundle = result._unsafeUnwrap();
    expect(bundle.quizzes.levels).toEqual([1, 2, 3]);
    expect(bundle.scenarios['en']?.map((scenario) => scenario.id)).toEqual([
      'phishing_sms',
      'fake_bank_call',
      'marketplace_deposit',
    ]);
    expect(bundle.tips['ru']).toHaveLength(8);
    expect(bundle.lessons['en']?.map((lesson) => lesson.title)).toEqual([
      'Recognizing fraud',
      'Protecting bank cards',
      'Safe payments',
      'If something feels wrong',
      'Keep practising',
    ]);
    expect(bundle.lessons['ru']).toHaveLength(5);
  });

  it('ships scenarios whose start node exists', async () => {
    const bundle = (await loadContentBundle(CONTENT_DIR))._unsafeUnwrap();

    for (const scenarios of Object.values(bundle.scenarios)) {
      for (const scenario of scenarios) {
        expect(scenario.nodes[scenario.start], scenario.id).toBeDefined();
      }
    }
  });

  describe('with broken files', () => {
    let directory: string;

    const writeBundle = async (files: Partial<Record<(typeof CONTENT_KEYS)[number], unknown>>) => {
      const bundle = makeTestBundle();
      const contents = {
        quizzes: bundle.quizzes,
        scenarios: bundle.scenarios,
        tips: bundle.tips,
        lessons: bundle.lessons,
        ...files,
      };
      for (const key of CONTENT_KEYS) {
        const value = contents[key];
        await writeFile(
          path.join(directory, CONTENT_FILES[key]),
          typeof value === 'string' ? value : JSON.stringify(value)
        );
      }
    };

    beforeEach(async () => {
      directory = await mkdtemp(path.join(tmpdir(), 'content-test-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('accepts a valid bundle', async () => {
      await writeBundle({});

      const result = await loadContentBundle(directory);

      expect(result._unsafeUnwrap()).toEqual(makeTestBundle());
    });

    it('reports a missing directory', async () => {
      const result = await loadContentBundle(path.join(directory, 'missing'));

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'ContentUnavailableError',
        file: 'quizzes.json',
      });
    });

    it('reports malformed JSON', async () => {
      await writeBundle({ tips: '{ not json' });

      const result = await loadContentBundle(directory);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidContentError',
        file: 'tips.json',
      });
    });

    it('reports a lesson without a body', async () => {
      await writeBundle({ lessons: { en: [{ title: 'Empty', body: '' }] } });

      const result = await loadContentBundle(directory);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidContentError',
        file: 'lessons.json',
      });
    });

    it('reports an answer index out of range', async () => {
      const broken = { ...makeQuestion('Broken'), correctOptionIndex: 5 };
      await writeBundle({
        quizzes: { levels: [1], questions: { en: { '1': [broken] } } },
      });

      const result = await loadContentBundle(directory);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'InvalidContentError',
        message: "Content file 'quizzes.json' is invalid: /en/1/0: correctOptionIndex is out of range",
        file: 'quizzes.json',
        details: ['/en/1/0: correctOptionIndex is out of range'],
      });
    });

    it('reports questions for an unlisted level', async () => {
      await writeBundle({
        quizzes: { levels: [1], questions: { en: { '1': [makeQuestion('A')], '4': [makeQuestion('B')] } } },
      });

      const result = await loadContentBundle(directory);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        details: ['/en/4: level is not listed in levels'],
      });
    });

    it('reports a node id too long for button data', async () => {
      const LONG_NODE_ID = 'n'.repeat(30);
      const scenario = makeTestBundle().scenarios['en']?.[0];
      expect(scenario).toBeDefined();
      if (scenario === undefined) return;
      await writeBundle({
        scenarios: {
          en: [
            {
              ...scenario,
              nodes: { ...scenario.nodes, [LONG_NODE_ID]: { kind: 'terminal', outcome: 'fail', text: 'x' } },
            },
          ],
        },
      });

      const result = await loadContentBundle(directory);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        file: 'scenarios.json',
        details: [`/en/phish_sms/nodes/${LONG_NODE_ID}: invalid node id`],
      });
    });
  });
});

describe('createContentCatalog', () => {
  const catalog = createContentCatalog(
    makeTestBundle({
      quizzes: {
        levels: [3, 1, 2, 1],
        questions: { en: { '1': [makeQuestion('English')] }, ru: { '1': [makeQuestion('Русский')] } },
      },
    })
  );

  it('lists levels sorted and unique', () => {
    expect(catalog.listLevels()).toEqual([1, 2, 3]);
    expect(catalog.maxLevel()).toBe(3);
  });

  it('serves questions per language', () => {
    expect(catalog.getQuestions('ru', 1).map((question) => question.prompt)).toEqual(['Русский']);
    expect(catalog.getQuestions('en', 2)).toEqual([]);
  });

  it('falls back to English content', () => {
    expect(catalog.getTips('ru')).toEqual(['Never share one-time codes.', 'Check the sender.']);
    expect(catalog.listLessons('ru').map((lesson) => lesson.title)).toEqual([
      'Spotting fraud',
      'Card safety',
    ]);
    expect(catalog.listScenarios('ru')).toEqual([
      { id: 'phish_sms', title: 'Blocked card SMS', reward: 30, badge: 'phishing_hero' },
    ]);
  });

  it('finds a scenario by id', () => {
    expect(catalog.getScenario('en', 'phish_sms')?.start).toBe('s1');
    expect(catalog.getScenario('en', 'nope')).toBeNull();
  });
});
