import {Context} from 'grammy';
import {PollImportService} from '../services/pollImportService';
import {QuestionService} from '../services/questionService';
import {QuizConversation} from '../types/context';
import {PollDescriptor} from '../types/quiz';
import {formatPollDescriptor, formatQuestionDetails} from '../utils/formatUtils';
import {toUserId} from '../utils/idUtils';
import {optionPickerKeyboard} from '../utils/keyboards';
import {attempt, waitForOptionPick, waitForText} from './helpers';

/** Where a cloned question comes from: a post link or a forwarded poll. */
export type CloneSource =
  | {kind: 'url'; url: string}
  | {kind: 'poll'; descriptor: PollDescriptor};

const CANCELLED = '❌ Cloning cancelled.';

export function createCloneQuestionConversation(questions: QuestionService, importer: PollImportService) {
  return async function cloneQuestion(conversation: QuizConversation, ctx: Context, source?: CloneSource) {
    const telegramId = ctx.from?.id;
    if (!telegramId) {
      await ctx.reply('Error: could not determine your user ID');
      return;
    }

    let descriptor: PollDescriptor;

    if (source?.kind === 'poll') {
      descriptor = source.descriptor;
    } else {
      let url = source?.url;
      if (!url) {
        await ctx.reply('🔗 Send the link to a Telegram post with a quiz (https://t.me/<channel>/<id>).\n\nUse /cancel to stop.');
        const reply = await waitForText(conversation);
        if (reply === null) {
          await ctx.reply(CANCELLED);
          return;
        }
        url = reply;
      }

      const link = url;
      const fetched = await conversation.external(() =>
        attempt(() => importer.fetchFromUrl(link), 'importing a quiz')
      );
      if (!fetched.ok) {
        await ctx.reply(`${fetched.message}\n\nYou can still create the question yourself with /add.`);
        return;
      }
      descriptor = fetched.value;
    }

    if (descriptor.options.length < 2) {
      await ctx.reply('⚠️ A quiz needs at least 2 options, this one cannot be cloned.');
      return;
    }

    let correctIndex = descriptor.correctIndex;
    if (correctIndex === undefined) {
      await ctx.reply(`${formatPollDescriptor(descriptor)}\n\n✅ Which option is correct?`, {
        reply_markup: optionPickerKeyboard(descriptor.options),
      });
      const picked = await waitForOptionPick(conversation, descriptor.options.length);
      if (picked === null) {
        await ctx.reply(CANCELLED);
        return;
      }
      correctIndex = picked;
    } else {
      await ctx.reply(formatPollDescriptor(descriptor));
    }

    await ctx.reply('🏷 Send a category for this question, or "-" to use the default.');
    const category = await waitForText(conversation);
    if (category === null) {
      await ctx.reply(CANCELLED);
      return;
    }

    const chosen = correctIndex;
    const outcome = await conversation.external(() =>
      attempt(
        () => questions.cloneQuestion(descriptor, {
          createdBy: toUserId(telegramId),
          correctIndex: chosen,
          category: category === '-' ? undefined : category,
        }),
        'cloning a question'
      )
    );

    if (!outcome.ok) {
      await ctx.reply(outcome.message);
      return;
    }

    await ctx.reply(`✅ Quiz cloned!\n\n${formatQuestionDetails(outcome.value)}`);
  };
}
