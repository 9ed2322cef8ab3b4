import {Bot, InlineKeyboard} from 'grammy';
import {isQuizBotError} from '../services/errors';
import {QuestionService} from '../services/questionService';
import {QuizEngine} from '../services/quizEngine';
import {MyContext} from '../types/context';
import {BotDeps} from '../types/deps';
import {AnswerResult, Question} from '../types/quiz';
import {describeError, formatQuestionDetails, formatVerdict} from '../utils/formatUtils';
import {toUserId} from '../utils/idUtils';
import {
  QUIZ_ANSWER_PATTERN,
  REMOVE_CANCEL_DATA,
  REMOVE_CONFIRM_PATTERN,
  REMOVE_SELECT_PATTERN,
  parseQuizAnswerData,
  removeConfirmKeyboard,
} from '../utils/keyboards';
import {logger} from '../utils/logger';

/**
 * The part of a callback query context the handlers below use.
 */
export interface TapContext {
  from: {id: number; first_name: string; username?: string};
  callbackQuery: {data: string; message?: {message_id: number; text?: string}};
  answerCallbackQuery(options?: {text?: string; show_alert?: boolean}): Promise<unknown>;
  editMessageText(text: string, options?: {reply_markup?: InlineKeyboard}): Promise<unknown>;
  reply(text: string): Promise<unknown>;
}

export function registerCallbacks(bot: Bot<MyContext>, deps: BotDeps) {
  bot.callbackQuery(QUIZ_ANSWER_PATTERN, (ctx) => handleQuizAnswer(ctx, deps.engine));
  bot.callbackQuery(REMOVE_SELECT_PATTERN, (ctx) => handleRemoveSelect(ctx, ctx.match[1], deps.questions));
  bot.callbackQuery(REMOVE_CONFIRM_PATTERN, (ctx) => handleRemoveConfirm(ctx, ctx.match[1], deps.questions));
  bot.callbackQuery(REMOVE_CANCEL_DATA, (ctx) => handleRemoveCancel(ctx));
}

export async function handleQuizAnswer(ctx: TapContext, engine: QuizEngine): Promise<void> {
  const answer = parseQuizAnswerData(ctx.callbackQuery.data);

  if (!answer) {
    await ctx.answerCallbackQuery({text: 'Error: invalid data'});
    return;
  }

  if (toUserId(ctx.from.id) !== answer.ownerId) {
    await ctx.answerCallbackQuery({
      text: 'This question is not for you. Use /play to get your own!',
      show_alert: true,
    });
    return;
  }

  let result: AnswerResult;
  try {
    result = await engine.submitAnswer(answer.ownerId, answer.optionIndex, {
      questionId: answer.questionId,
      name: ctx.from.username ?? ctx.from.first_name,
    });
  } catch (error) {
    // Stale and duplicate taps end up here as NO_ACTIVE_SESSION
    if (!isQuizBotError(error) || error.code === 'STORE_UNAVAILABLE') {
      logger.error('Error while scoring an answer', error);
    }
    await ctx.answerCallbackQuery({text: describeError(error), show_alert: true});
    return;
  }

  // Recorded from here on
  await ctx.answerCallbackQuery({text: result.correct ? '✅ Correct!' : '❌ Wrong!'});

  const questionText = ctx.callbackQuery.message?.text;
  const verdict = formatVerdict(result);
  try {
    await ctx.editMessageText((questionText ? `${questionText}\n\n` : '') + verdict);
  } catch (error) {
    logger.warn('Could not edit the quiz message, replying instead', error);
    await ctx.reply(verdict);
  }
}

export async function handleRemoveSelect(ctx: TapContext, id: string, questions: QuestionService): Promise<void> {
  try {
    const question = await questions.getQuestion(id);
    await ctx.answerCallbackQuery();

    if (!question) {
      await ctx.editMessageText(`⚠️ Question ${id} not found.`);
      return;
    }

    await ctx.editMessageText(
      `Are you sure you want to delete this question?\n\n${formatQuestionDetails(question)}`,
      {reply_markup: removeConfirmKeyboard(question.id)}
    );
  } catch (error) {
    logger.error('Error while selecting a question to remove', error);
    await ctx.answerCallbackQuery({text: describeError(error), show_alert: true});
  }
}

export async function handleRemoveConfirm(ctx: TapContext, id: string, questions: QuestionService): Promise<void> {
  let removed: Question;
  try {
    removed = await questions.removeQuestion(id);
  } catch (error) {
    if (!isQuizBotError(error) || error.code === 'STORE_UNAVAILABLE') {
      logger.error('Error while removing a question', error);
    }
    await ctx.answerCallbackQuery();
    await ctx.editMessageText(describeError(error));
    return;
  }

  await ctx.answerCallbackQuery({text: '🗑 Deleted'});
  await ctx.editMessageText(`✅ Question ID ${removed.id} has been deleted.`);
}

export async function handleRemoveCancel(ctx: TapContext): Promise<void> {
  await ctx.answerCallbackQuery();
  await ctx.editMessageText('Deletion cancelled.');
}
