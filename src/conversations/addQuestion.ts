import {Context} from 'grammy';
import {QuestionService} from '../services/questionService';
import {QuizConversation} from '../types/context';
import {formatOptions, formatQuestionDetails, parseOptionLines} from '../utils/formatUtils';
import {toUserId} from '../utils/idUtils';
import {optionPickerKeyboard} from '../utils/keyboards';
import {attempt, waitForOptionPick, waitForText} from './helpers';

const CANCELLED = '❌ Question creation cancelled.';

export function createAddQuestionConversation(questions: QuestionService) {
  return async function addQuestion(conversation: QuizConversation, ctx: Context) {
    const telegramId = ctx.from?.id;
    if (!telegramId) {
      await ctx.reply('Error: could not determine your user ID');
      return;
    }

    await ctx.reply('📝 Send the question text.\n\nUse /cancel at any time to stop.');
    const text = await waitForText(conversation);
    if (text === null) {
      await ctx.reply(CANCELLED);
      return;
    }

    await ctx.reply('📋 Send the answer options, one per line (at least 2).');
    let options: string[] = [];
    while (options.length < 2) {
      const reply = await waitForText(conversation);
      if (reply === null) {
        await ctx.reply(CANCELLED);
        return;
      }
      options = parseOptionLines(reply);
      if (options.length < 2) {
        await ctx.reply('⚠️ Please send at least 2 options, one per line.');
      }
    }

    await ctx.reply(`${formatOptions(options)}\n\n✅ Which option is correct?`, {
      reply_markup: optionPickerKeyboard(options),
    });
    const correctIndex = await waitForOptionPick(conversation, options.length);
    if (correctIndex === null) {
      await ctx.reply(CANCELLED);
      return;
    }

    await ctx.reply('🏷 Send a category for this question, or "-" to use the default.');
    const category = await waitForText(conversation);
    if (category === null) {
      await ctx.reply(CANCELLED);
      return;
    }

    const outcome = await conversation.external(() =>
      attempt(
        () => questions.addQuestion({
          category: category === '-' ? '' : category,
          text,
          options,
          correctIndex,
          createdBy: toUserId(telegramId),
        }),
        'adding a question'
      )
    );

    if (!outcome.ok) {
      await ctx.reply(outcome.message);
      return;
    }

    await ctx.reply(`✅ Question added!\n\n${formatQuestionDetails(outcome.value)}`);
  };
}
