import {isQuizBotError} from '../services/errors';
import {QuizConversation} from '../types/context';
import {describeError} from '../utils/formatUtils';
import {logger} from '../utils/logger';

export const CANCEL_COMMAND = '/cancel';

/**
 * Outcome of a service call made from a conversation. Conversations replay
 * stored results, so failures travel as plain data rather than thrown errors.
 */
export type Outcome<T> = {ok: true; value: T} | {ok: false; message: string};

export async function attempt<T>(task: () => Promise<T>, action: string): Promise<Outcome<T>> {
  try {
    return {ok: true, value: await task()};
  } catch (error) {
    if (!isQuizBotError(error) || error.code === 'STORE_UNAVAILABLE') {
      logger.error(`Error while ${action}`, error);
    }
    return {ok: false, message: describeError(error)};
  }
}

/** Next text message of the user; null when they sent /cancel. */
export async function waitForText(conversation: QuizConversation): Promise<string | null> {
  const reply = await conversation.waitFor('message:text');
  const text = reply.message.text.trim();
  return text === CANCEL_COMMAND ? null : text;
}

/**
 * Waits until the user taps one of the `<prefix>:<index>` buttons or types a
 * number from 1 to `count`. null when they sent /cancel.
 */
export async function waitForOptionPick(
  conversation: QuizConversation,
  count: number,
  prefix = 'pick'
): Promise<number | null> {
  const pattern = new RegExp(`^${prefix}:(\\d+)$`);

  for (;;) {
    const update = await conversation.wait();
    const data = update.callbackQuery?.data;
    const text = update.message?.text?.trim();

    if (text === CANCEL_COMMAND) {
      return null;
    }

    if (data !== undefined) {
      const match = data.match(pattern);
      if (!match) {
        // Not ours, e.g. an answer to a quiz question
        return conversation.skip();
      }
      await update.answerCallbackQuery();
      const index = Number(match[1]);
      if (index < count) {
        return index;
      }
      continue;
    }

    if (text === undefined) {
      return conversation.skip();
    }

    const typed = Number(text);
    if (Number.isInteger(typed) && typed >= 1 && typed <= count) {
      return typed - 1;
    }

    await update.reply(`Please tap one of the buttons or send a number from 1 to ${count}.`);
  }
}

/**
 * Waits for a tap on one of `choices` (callback data). null on /cancel.
 */
export async function waitForChoice<T extends string>(
  conversation: QuizConversation,
  choices: readonly T[]
): Promise<T | null> {
  for (;;) {
    const update = await conversation.wait();
    const text = update.message?.text?.trim();
    if (text === CANCEL_COMMAND) {
      return null;
    }

    const data = update.callbackQuery?.data;
    const choice = choices.find(c => c === data);
    if (choice) {
      await update.answerCallbackQuery();
      return choice;
    }

    if (text === undefined) {
      return conversation.skip();
    }

    await update.reply('Please tap one of the buttons, or send /cancel.');
  }
}
