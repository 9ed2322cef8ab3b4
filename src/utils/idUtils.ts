/**
 * Utility functions for handling the different kinds of ids in the bot
 */

const QUESTION_ID_PATTERN = /^[A-Za-z0-9_-]{1,32}$/;

/**
 * Telegram user ids are numbers; the stores key users by their string form
 */
export function toUserId(telegramId: number | string): string {
  return String(telegramId);
}

/**
 * Next free question id: one above the highest numeric id in use.
 * Compared as bigints, so ids past 2^53 still increase.
 */
export function nextQuestionId(existingIds: Iterable<string>): string {
  let max = 0n;
  for (const id of existingIds) {
    if (/^\d+$/.test(id)) {
      const value = BigInt(id);
      if (value > max) {
        max = value;
      }
    }
  }
  return (max + 1n).toString();
}

/**
 * Normalizes a question id typed by a user; null when it cannot be an id
 */
export function parseQuestionId(input: string | undefined): string | null {
  const trimmed = input?.trim().replace(/^#/, '') ?? '';
  return QUESTION_ID_PATTERN.test(trimmed) ? trimmed : null;
}
