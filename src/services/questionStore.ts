import {QuestionListSchema} from '../schemas/quiz';
import {fileExists, readJsonFile, writeJsonFile} from '../storage/jsonFile';
import {SerialQueue} from '../storage/serialQueue';
import {Question} from '../types/quiz';
import {logger} from '../utils/logger';
import {QuestionNotFoundError} from './errors';

export interface QuestionStore {
  list(): Promise<Question[]>;
  get(id: string): Promise<Question | undefined>;
  append(question: Question): Promise<void>;
  update(id: string, question: Question): Promise<void>;
  /** false when nothing had that id */
  delete(id: string): Promise<boolean>;
}

export const SAMPLE_QUESTIONS: readonly Question[] = [
  {
    id: '1',
    category: 'Geography',
    text: 'What is the capital of France?',
    options: ['Berlin', 'Madrid', 'Paris', 'Rome'],
    correctIndex: 2,
    createdBy: 'system',
    createdAt: '2025-01-01T00:00:00.000Z',
  },
  {
    id: '2',
    category: 'Science',
    text: 'Which planet is known as the Red Planet?',
    options: ['Venus', 'Mars', 'Jupiter', 'Saturn'],
    correctIndex: 1,
    createdBy: 'system',
    createdAt: '2025-01-01T00:00:00.000Z',
  },
];

export class JsonQuestionStore implements QuestionStore {
  private readonly writes = new SerialQueue();

  constructor(private readonly filePath: string) {}

  /**
   * Writes the sample questions when the file does not exist yet.
   */
  async init(seed: readonly Question[] = SAMPLE_QUESTIONS): Promise<void> {
    if (await fileExists(this.filePath)) {
      return;
    }
    await writeJsonFile(this.filePath, seed);
    logger.info(`Created ${this.filePath} with ${seed.length} sample questions`);
  }

  async list(): Promise<Question[]> {
    return readJsonFile<Question[]>(this.filePath, [], QuestionListSchema);
  }

  async get(id: string): Promise<Question | undefined> {
    const questions = await this.list();
    return questions.find(q => q.id === id);
  }

  append(question: Question): Promise<void> {
    return this.writes.run(async () => {
      const questions = await this.list();
      questions.push(question);
      await writeJsonFile(this.filePath, questions);
    });
  }

  update(id: string, question: Question): Promise<void> {
    return this.writes.run(async () => {
      const questions = await this.list();
      const index = questions.findIndex(q => q.id === id);
      if (index === -1) {
        throw new QuestionNotFoundError(id);
      }
      questions[index] = question;
      await writeJsonFile(this.filePath, questions);
    });
  }

  delete(id: string): Promise<boolean> {
    return this.writes.run(async () => {
      const questions = await this.list();
      const remaining = questions.filter(q => q.id !== id);
      if (remaining.length === questions.length) {
        return false;
      }
      await writeJsonFile(this.filePath, remaining);
      return true;
    });
  }
}
