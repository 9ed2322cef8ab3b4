import {NoQuestionsAvailableError, isQuizBotError} from '../services/errors';
import {AnswerResult, CategorySummary, PollDescriptor, Question, QuizPrompt, UserStat} from '../types/quiz';

export const MAX_MESSAGE_LENGTH = 4096;
const QUESTIONS_PER_CATEGORY_IN_LIST = 5;

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function formatOptions(options: string[]): string {
  return options.map((option, i) => `${i + 1}. ${option}`).join('\n');
}

export function formatPrompt(prompt: QuizPrompt): string {
  return (
    `❓ ${prompt.text}\n\n` +
    `${formatOptions(prompt.options)}\n\n` +
    `🏷 ${prompt.category} · ID ${prompt.questionId}`
  );
}

export function formatVerdict(result: AnswerResult): string {
  let message = result.correct
    ? '✅ Correct!'
    : `❌ Wrong! The correct answer is: ${result.correctOption}`;

  if (result.explanation) {
    message += `\n\n💡 ${result.explanation}`;
  }

  message +=
    `\n\n📊 Score: ${result.stats.correct}/${result.stats.answered} (${formatPercent(result.accuracy)})\n` +
    'Use /play to try another question.';
  return message;
}

export function formatUserStats(stat: UserStat): string {
  if (stat.answered === 0) {
    return "You haven't answered any quiz questions yet. Use /play to start a quiz!";
  }

  const ratio = stat.correct / stat.answered;
  let message =
    '📊 Your quiz statistics\n\n' +
    `Total questions answered: ${stat.answered}\n` +
    `Correct answers: ${stat.correct}\n` +
    `Accuracy: ${formatPercent(ratio)}`;

  const categories = Object.entries(stat.categories).sort(([a], [b]) => a.localeCompare(b));
  if (categories.length > 0) {
    message += '\n\nBy category:\n';
    message += categories
      .map(([name, entry]) => `• ${name}: ${entry.correct}/${entry.answered}`)
      .join('\n');
  }
  return message;
}

export function formatQuestionList(questions: Question[]): string {
  if (questions.length === 0) {
    return 'No quiz questions available. Use /add to create some!';
  }

  const byCategory = new Map<string, Question[]>();
  for (const question of questions) {
    const bucket = byCategory.get(question.category) ?? [];
    bucket.push(question);
    byCategory.set(question.category, bucket);
  }

  let message = '📋 Available quiz questions\n\n';
  for (const [category, entries] of byCategory) {
    message += `${category} (${entries.length})\n`;
    for (const question of entries.slice(0, QUESTIONS_PER_CATEGORY_IN_LIST)) {
      message += `- ID ${question.id}: ${truncate(question.text, 40)}\n`;
    }
    if (entries.length > QUESTIONS_PER_CATEGORY_IN_LIST) {
      message += `  ... and ${entries.length - QUESTIONS_PER_CATEGORY_IN_LIST} more\n`;
    }
    message += '\n';
  }
  message += 'Use /play to play a random question, or /edit <ID> to edit one.';
  return truncate(message, MAX_MESSAGE_LENGTH);
}

export function formatQuestionDetails(question: Question): string {
  let message =
    `ID: ${question.id}\n` +
    `Category: ${question.category}\n` +
    `Question: ${question.text}\n\n` +
    `Options:\n${formatOptions(question.options)}\n\n` +
    `Correct answer: ${question.options[question.correctIndex]}`;
  if (question.explanation) {
    message += `\nExplanation: ${question.explanation}`;
  }
  return message;
}

export function formatPollDescriptor(descriptor: PollDescriptor): string {
  return `Question: ${descriptor.question}\n\nOptions:\n${formatOptions(descriptor.options)}`;
}

export function formatCategories(categories: CategorySummary[]): string {
  if (categories.length === 0) {
    return 'No categories yet. Use /add to create a question!';
  }
  return (
    '🗂 Categories\n\n' +
    categories.map(c => `• ${c.name} (${c.questionCount})`).join('\n')
  );
}

/**
 * Splits a message into trimmed non-empty lines (one option per line).
 */
export function parseOptionLines(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Reply text for a failed operation. Internal details of unexpected errors
 * stay in the log.
 */
export function describeError(error: unknown): string {
  if (!isQuizBotError(error)) {
    return '❌ Something went wrong. Please try again later.';
  }

  switch (error.code) {
    case 'NO_QUESTIONS_AVAILABLE':
      return error instanceof NoQuestionsAvailableError && error.category
        ? `📭 ${error.message}. Use /categories to see what exists.`
        : '📭 No questions available. Add some with /add!';
    case 'NO_ACTIVE_SESSION':
      return '⚠️ This question is no longer active. Use /play to get a new one.';
    case 'INVALID_QUESTION':
    case 'POLL_IMPORT_FAILED':
      return `⚠️ ${error.message}`;
    case 'QUESTION_NOT_FOUND':
      return `⚠️ ${error.message}. Use /list to see available questions.`;
    case 'STORE_UNAVAILABLE':
      return '❌ Quiz data is unavailable right now. Please try again later.';
  }
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
