import {InMemoryQuestionStore} from '../testing/inMemoryStores';
import {QuestionDraft} from '../types/quiz';
import {InvalidQuestionError, QuestionNotFoundError, StoreUnavailableError} from './errors';
import {DEFAULT_CATEGORY, QuestionService, normalizeDraft} from './questionService';
import {SAMPLE_QUESTIONS} from './questionStore';

const NOW = '2025-06-01T12:00:00.000Z';

function draft(overrides: Partial<QuestionDraft> = {}): QuestionDraft {
  return {
    category: 'Science',
    text: 'What is H2O?',
    options: ['Water', 'Salt'],
    correctIndex: 0,
    createdBy: '42',
    ...overrides,
  };
}

describe('QuestionService', () => {
  let store: InMemoryQuestionStore;
  let service: QuestionService;

  beforeEach(() => {
    store = new InMemoryQuestionStore([...SAMPLE_QUESTIONS]);
    service = new QuestionService(store, () => new Date(NOW));
  });

  describe('addQuestion', () => {
    it('stores the draft under a fresh id', async () => {
      const input = draft({createdAt: '2025-05-01T00:00:00.000Z'});
      const added = await service.addQuestion(input);

      expect(added.id).toBe('3');
      expect(await store.get(added.id)).toEqual({...input, id: '3'});
    });

    it('stamps the creation time and trims the fields', async () => {
      const added = await service.addQuestion(draft({
        category: '  ',
        text: '  What is H2O?  ',
        options: [' Water ', 'Salt '],
        explanation: '   ',
      }));

      expect(added).toEqual({
        id: '3',
        category: DEFAULT_CATEGORY,
        text: 'What is H2O?',
        options: ['Water', 'Salt'],
        correctIndex: 0,
        createdBy: '42',
        createdAt: NOW,
      });
      expect(added).not.toHaveProperty('explanation');
    });

    it('hands out distinct ids to concurrent additions', async () => {
      const [a, b] = await Promise.all([service.addQuestion(draft()), service.addQuestion(draft())]);

      expect([a.id, b.id]).toEqual(['3', '4']);
      expect(await store.list()).toHaveLength(4);
    });

    it.each([
      [draft({text: ' '}), 'Invalid question: the question text is empty'],
      [draft({options: ['Only']}), 'Invalid question: at least 2 options are required'],
      [draft({options: ['Water', ' ']}), 'Invalid question: options must not be empty'],
      [draft({correctIndex: 2}), 'Invalid question: the correct option must be between 1 and 2'],
      [draft({correctIndex: -1}), 'Invalid question: the correct option must be between 1 and 2'],
      [draft({correctIndex: 0.5}), 'Invalid question: the correct option must be between 1 and 2'],
    ])('rejects an invalid draft (%#)', async (input, message) => {
      await expect(service.addQuestion(input)).rejects.toThrow(message);
      expect(await store.list()).toHaveLength(2);
    });
  });

  describe('editQuestion', () => {
    it('applies the patch and keeps identity fields', async () => {
      const updated = await service.editQuestion('1', {text: '  Capital of France?  ', category: 'Europe'});

      expect(updated).toEqual({...SAMPLE_QUESTIONS[0], text: 'Capital of France?', category: 'Europe'});
      expect(await store.get('1')).toEqual(updated);
    });

    it('validates the merged question', async () => {
      await expect(service.editQuestion('1', {options: ['Paris', 'Rome']})).rejects.toBeInstanceOf(InvalidQuestionError);
      expect(await store.get('1')).toEqual(SAMPLE_QUESTIONS[0]);
    });

    it('drops an explanation patched to blank', async () => {
      await service.editQuestion('2', {explanation: 'Iron oxide'});
      const cleared = await service.editQuestion('2', {explanation: ''});

      expect(cleared).not.toHaveProperty('explanation');
    });

    it('fails for an unknown id', async () => {
      await expect(service.editQuestion('99', {text: 'x'})).rejects.toBeInstanceOf(QuestionNotFoundError);
    });
  });

  describe('removeQuestion', () => {
    it('returns the removed question', async () => {
      const removed = await service.removeQuestion('2');

      expect(removed.id).toBe('2');
      expect((await store.list()).map(q => q.id)).toEqual(['1']);
    });

    it('fails for an unknown id and leaves the store alone', async () => {
      await expect(service.removeQuestion('99')).rejects.toThrow('Question 99 not found');
      expect(await store.list()).toEqual([...SAMPLE_QUESTIONS]);
    });

    it('does not reuse the id of the newest question', async () => {
      await service.removeQuestion('1');
      const added = await service.addQuestion(draft());

      expect(added.id).toBe('3');
    });
  });

  describe('cloneQuestion', () => {
    it('takes the correct option from the poll', async () => {
      const cloned = await service.cloneQuestion(
        {question: 'Largest ocean?', options: ['Atlantic', 'Pacific'], correctIndex: 1, explanation: 'By area', source: 'forwarded poll'},
        {createdBy: '7'}
      );

      expect(cloned).toEqual({
        id: '3',
        category: DEFAULT_CATEGORY,
        text: 'Largest ocean?',
        options: ['Atlantic', 'Pacific'],
        correctIndex: 1,
        explanation: 'By area',
        createdBy: '7',
        createdAt: NOW,
      });
    });

    it('falls back to the chosen option and category', async () => {
      const cloned = await service.cloneQuestion(
        {question: 'Largest ocean?', options: ['Atlantic', 'Pacific'], source: 'https://t.me/somechannel/5'},
        {createdBy: '7', correctIndex: 0, category: 'Geography'}
      );

      expect(cloned.correctIndex).toBe(0);
      expect(cloned.category).toBe('Geography');
    });

    it('needs to know the correct option', async () => {
      await expect(service.cloneQuestion(
        {question: 'Largest ocean?', options: ['Atlantic', 'Pacific'], source: 'forwarded poll'},
        {createdBy: '7'}
      )).rejects.toThrow('Invalid question: the correct option is not known');
    });

    it('validates like addQuestion', async () => {
      await expect(service.cloneQuestion(
        {question: 'Yes?', options: ['Yes'], correctIndex: 0, source: 'forwarded poll'},
        {createdBy: '7'}
      )).rejects.toBeInstanceOf(InvalidQuestionError);
    });
  });

  it('lists categories with counts sorted by name', async () => {
    await service.addQuestion(draft({category: 'Art'}));
    await service.addQuestion(draft());

    expect(await service.listCategories()).toEqual([
      {name: 'Art', questionCount: 1},
      {name: 'Geography', questionCount: 1},
      {name: 'Science', questionCount: 2},
    ]);
  });

  it('passes store failures through', async () => {
    store.failNext();
    await expect(service.listQuestions()).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

describe('normalizeDraft', () => {
  it('keeps a given creation time', () => {
    expect(normalizeDraft(draft({createdAt: NOW})).createdAt).toBe(NOW);
  });
});
