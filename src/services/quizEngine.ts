import {AnswerResult, Question, QuizPrompt, UserStat} from '../types/quiz';
import {logger} from '../utils/logger';
import {NoActiveSessionError, NoQuestionsAvailableError} from './errors';
import {QuestionStore} from './questionStore';
import {QuizSessionManager} from './quizSessionManager';
import {UserStore, accuracy, copyStat} from './userStore';

export interface QuizEngineDeps {
  questions: QuestionStore;
  users: UserStore;
  sessions: QuizSessionManager;
  /** returns a number in [0, 1) */
  random?: () => number;
  clock?: () => Date;
}

export interface StartSessionOptions {
  category?: string;
}

export interface SubmitAnswerOptions {
  /** the question the answer was given for; a mismatch means a stale prompt */
  questionId?: string;
  /** display name recorded with the user's stats */
  name?: string;
}

export class QuizEngine {
  private readonly questions: QuestionStore;
  private readonly users: UserStore;
  private readonly sessions: QuizSessionManager;
  private readonly random: () => number;
  private readonly clock: () => Date;

  constructor(deps: QuizEngineDeps) {
    this.questions = deps.questions;
    this.users = deps.users;
    this.sessions = deps.sessions;
    this.random = deps.random ?? Math.random;
    this.clock = deps.clock ?? (() => new Date());
  }

  async startSession(userId: string, options: StartSessionOptions = {}): Promise<QuizPrompt> {
    const pool = filterByCategory(await this.questions.list(), options.category);

    if (pool.length === 0) {
      throw new NoQuestionsAvailableError(options.category);
    }

    const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
    const question = copyQuestion(pool[index]);

    const replaced = this.sessions.open({
      userId,
      question,
      posedAt: this.clock(),
      status: 'pending',
    });

    if (replaced) {
      logger.debug(`Session of user ${userId} for question ${replaced.question.id} replaced`);
    }
    logger.debug(`User ${userId} got question ${question.id}`);

    return toPrompt(question);
  }

  async submitAnswer(
    userId: string,
    chosenIndex: number,
    options: SubmitAnswerOptions = {}
  ): Promise<AnswerResult> {
    const now = this.clock();
    const live = this.sessions.peek(userId, now);

    if (!live || (options.questionId !== undefined && live.question.id !== options.questionId)) {
      throw new NoActiveSessionError(userId);
    }

    // Taken out before the first await: a duplicate submission finds nothing
    const session = this.sessions.take(userId, now);
    if (!session) {
      throw new NoActiveSessionError(userId);
    }

    const {question} = session;
    const correct = chosenIndex === question.correctIndex;

    let stats: UserStat;
    try {
      stats = applyAnswer(await this.users.get(userId), question.category, correct, options.name);
      await this.users.put(userId, stats);
    } catch (error) {
      this.sessions.restore(session);
      throw error;
    }

    session.status = 'answered';
    logger.info(
      `User ${userId} answered question ${question.id}: ${correct ? 'correct' : 'wrong'} ` +
      `(${stats.correct}/${stats.answered})`
    );

    return {
      questionId: question.id,
      correct,
      chosenIndex,
      correctIndex: question.correctIndex,
      correctOption: question.options[question.correctIndex],
      explanation: question.explanation,
      stats,
      accuracy: accuracy(stats),
    };
  }

  cancelSession(userId: string): boolean {
    return this.sessions.peek(userId, this.clock()) !== undefined && this.sessions.delete(userId);
  }

  getUserStats(userId: string): Promise<UserStat> {
    return this.users.get(userId);
  }

  activeSessionCount(): number {
    this.sessions.sweepExpired(this.clock());
    return this.sessions.size;
  }
}

function filterByCategory(questions: Question[], category: string | undefined): Question[] {
  const wanted = category?.trim().toLowerCase();
  if (!wanted) {
    return questions;
  }
  return questions.filter(q => q.category.trim().toLowerCase() === wanted);
}

export function copyQuestion(question: Question): Question {
  return {...question, options: [...question.options]};
}

export function toPrompt(question: Question): QuizPrompt {
  return {
    questionId: question.id,
    category: question.category,
    text: question.text,
    options: [...question.options],
  };
}

export function applyAnswer(
  current: UserStat,
  category: string,
  correct: boolean,
  name?: string
): UserStat {
  const next = copyStat(current);
  const increment = correct ? 1 : 0;
  const bucket = next.categories[category] ?? {answered: 0, correct: 0};

  next.answered += 1;
  next.correct += increment;
  next.categories[category] = {
    answered: bucket.answered + 1,
    correct: bucket.correct + increment,
  };
  if (name) {
    next.name = name;
  }
  return next;
}
