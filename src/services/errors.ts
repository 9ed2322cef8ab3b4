import {isRecord} from '../utils/guards';

export type QuizErrorCode =
  | 'NO_QUESTIONS_AVAILABLE'
  | 'NO_ACTIVE_SESSION'
  | 'INVALID_QUESTION'
  | 'QUESTION_NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'POLL_IMPORT_FAILED';

/**
 * Base class for every recoverable condition the bot reports back to the
 * user. None of them should stop the update loop.
 */
export class QuizBotError extends Error {
  constructor(
    readonly code: QuizErrorCode,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options);
    this.name = 'QuizBotError';
  }
}

export class NoQuestionsAvailableError extends QuizBotError {
  constructor(readonly category?: string) {
    super(
      'NO_QUESTIONS_AVAILABLE',
      category ? `No questions available in category "${category}"` : 'No questions available'
    );
    this.name = 'NoQuestionsAvailableError';
  }
}

export class NoActiveSessionError extends QuizBotError {
  constructor(readonly userId: string) {
    super('NO_ACTIVE_SESSION', `No active quiz session for user ${userId}`);
    this.name = 'NoActiveSessionError';
  }
}

export class InvalidQuestionError extends QuizBotError {
  constructor(readonly reason: string) {
    super('INVALID_QUESTION', `Invalid question: ${reason}`);
    this.name = 'InvalidQuestionError';
  }
}

export class QuestionNotFoundError extends QuizBotError {
  constructor(readonly questionId: string) {
    super('QUESTION_NOT_FOUND', `Question ${questionId} not found`);
    this.name = 'QuestionNotFoundError';
  }
}

export class StoreUnavailableError extends QuizBotError {
  constructor(readonly filePath: string, cause: unknown) {
    const detail = isRecord(cause) && typeof cause.message === 'string' ? cause.message : String(cause);
    super('STORE_UNAVAILABLE', `Store ${filePath} is unavailable: ${detail}`, {cause});
    this.name = 'StoreUnavailableError';
  }
}

export class PollImportError extends QuizBotError {
  constructor(message: string, cause?: unknown) {
    super('POLL_IMPORT_FAILED', message, {cause});
    this.name = 'PollImportError';
  }
}

export function isQuizBotError(error: unknown): error is QuizBotError {
  return error instanceof QuizBotError;
}
