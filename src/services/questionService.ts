import {SerialQueue} from '../storage/serialQueue';
import {CategorySummary, PollDescriptor, Question, QuestionDraft, QuestionPatch} from '../types/quiz';
import {nextQuestionId} from '../utils/idUtils';
import {logger} from '../utils/logger';
import {InvalidQuestionError, QuestionNotFoundError} from './errors';
import {QuestionStore} from './questionStore';

export const DEFAULT_CATEGORY = 'User Created';

export interface CloneOverrides {
  createdBy: string;
  /** used when the source did not say which option is correct */
  correctIndex?: number;
  category?: string;
}

/**
 * Authoring operations over the question pool. Mutations go through one
 * queue so id assignment and the store write cannot interleave.
 */
export class QuestionService {
  private readonly mutations = new SerialQueue();

  constructor(
    private readonly store: QuestionStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async addQuestion(draft: QuestionDraft): Promise<Question> {
    const valid = normalizeDraft(draft);
    return this.mutations.run(async () => {
      const existing = await this.store.list();
      const question: Question = {
        ...valid,
        id: nextQuestionId(existing.map(q => q.id)),
        createdAt: valid.createdAt ?? this.clock().toISOString(),
      };
      await this.store.append(question);
      logger.info(`Question ${question.id} added by ${question.createdBy}`);
      return question;
    });
  }

  editQuestion(id: string, patch: QuestionPatch): Promise<Question> {
    return this.mutations.run(async () => {
      const existing = await this.store.get(id);
      if (!existing) {
        throw new QuestionNotFoundError(id);
      }
      const merged = normalizeDraft({...existing, ...patch});
      const updated: Question = {
        ...merged,
        id: existing.id,
        createdBy: existing.createdBy,
        createdAt: existing.createdAt,
      };
      await this.store.update(id, updated);
      logger.info(`Question ${id} edited`);
      return updated;
    });
  }

  removeQuestion(id: string): Promise<Question> {
    return this.mutations.run(async () => {
      const existing = await this.store.get(id);
      if (!existing || !(await this.store.delete(id))) {
        throw new QuestionNotFoundError(id);
      }
      logger.info(`Question ${id} removed`);
      return existing;
    });
  }

  async cloneQuestion(source: PollDescriptor, overrides: CloneOverrides): Promise<Question> {
    const correctIndex = source.correctIndex ?? overrides.correctIndex;
    if (correctIndex === undefined) {
      throw new InvalidQuestionError('the correct option is not known');
    }
    return this.addQuestion({
      category: overrides.category ?? DEFAULT_CATEGORY,
      text: source.question,
      options: source.options,
      correctIndex,
      explanation: source.explanation,
      createdBy: overrides.createdBy,
    });
  }

  getQuestion(id: string): Promise<Question | undefined> {
    return this.store.get(id);
  }

  listQuestions(): Promise<Question[]> {
    return this.store.list();
  }

  async listCategories(): Promise<CategorySummary[]> {
    const counts = new Map<string, number>();
    for (const question of await this.store.list()) {
      counts.set(question.category, (counts.get(question.category) ?? 0) + 1);
    }
    return [...counts.entries()]
      .map(([name, questionCount]) => ({name, questionCount}))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}

/**
 * Validates a draft and returns it trimmed. Throws InvalidQuestionError
 * naming the first problem found.
 */
export function normalizeDraft(draft: QuestionDraft): QuestionDraft {
  const text = draft.text.trim();
  if (text.length === 0) {
    throw new InvalidQuestionError('the question text is empty');
  }

  const options = draft.options.map(o => o.trim());
  if (options.length < 2) {
    throw new InvalidQuestionError('at least 2 options are required');
  }
  if (options.some(o => o.length === 0)) {
    throw new InvalidQuestionError('options must not be empty');
  }

  if (
    !Number.isInteger(draft.correctIndex) ||
    draft.correctIndex < 0 ||
    draft.correctIndex >= options.length
  ) {
    throw new InvalidQuestionError(
      `the correct option must be between 1 and ${options.length}`
    );
  }

  const explanation = draft.explanation?.trim();
  const normalized: QuestionDraft = {
    category: draft.category.trim() || DEFAULT_CATEGORY,
    text,
    options,
    correctIndex: draft.correctIndex,
    createdBy: draft.createdBy,
  };
  if (explanation) {
    normalized.explanation = explanation;
  }
  if (draft.createdAt !== undefined) {
    normalized.createdAt = draft.createdAt;
  }
  return normalized;
}
