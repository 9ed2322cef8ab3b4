import {Context, InlineKeyboard} from 'grammy';
import {QuestionService} from '../services/questionService';
import {QuizConversation} from '../types/context';
import {QuestionPatch} from '../types/quiz';
import {formatOptions, formatQuestionDetails, parseOptionLines} from '../utils/formatUtils';
import {optionPickerKeyboard} from '../utils/keyboards';
import {attempt, waitForChoice, waitForOptionPick, waitForText} from './helpers';

const EDIT_FIELDS = ['edit:text', 'edit:options', 'edit:answer', 'edit:category', 'edit:explanation'] as const;
type EditField = typeof EDIT_FIELDS[number];

const CANCELLED = '❌ Editing cancelled.';

function editFieldKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📝 Question text', 'edit:text')
    .text('📋 Options', 'edit:options')
    .row()
    .text('✅ Correct answer', 'edit:answer')
    .text('🏷 Category', 'edit:category')
    .row()
    .text('💡 Explanation', 'edit:explanation');
}

export function createEditQuestionConversation(questions: QuestionService) {
  return async function editQuestion(conversation: QuizConversation, ctx: Context, id: string) {
    const loaded = await conversation.external(() =>
      attempt(() => questions.getQuestion(id), 'loading a question')
    );
    if (!loaded.ok) {
      await ctx.reply(loaded.message);
      return;
    }
    const question = loaded.value;
    if (!question) {
      await ctx.reply(`⚠️ No question found with ID ${id}. Use /list to see available questions.`);
      return;
    }

    await ctx.reply(
      `${formatQuestionDetails(question)}\n\nWhat would you like to change? Use /cancel to stop.`,
      {reply_markup: editFieldKeyboard()}
    );
    const field: EditField | null = await waitForChoice(conversation, EDIT_FIELDS);
    if (field === null) {
      await ctx.reply(CANCELLED);
      return;
    }

    const patch: QuestionPatch = {};

    switch (field) {
      case 'edit:text': {
        await ctx.reply('📝 Send the new question text.');
        const text = await waitForText(conversation);
        if (text === null) {
          await ctx.reply(CANCELLED);
          return;
        }
        patch.text = text;
        break;
      }
      case 'edit:options': {
        await ctx.reply('📋 Send the new options, one per line (at least 2).');
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
        patch.options = options;
        patch.correctIndex = correctIndex;
        break;
      }
      case 'edit:answer': {
        await ctx.reply('✅ Which option is correct?', {
          reply_markup: optionPickerKeyboard(question.options),
        });
        const correctIndex = await waitForOptionPick(conversation, question.options.length);
        if (correctIndex === null) {
          await ctx.reply(CANCELLED);
          return;
        }
        patch.correctIndex = correctIndex;
        break;
      }
      case 'edit:category': {
        await ctx.reply('🏷 Send the new category, or "-" to use the default.');
        const category = await waitForText(conversation);
        if (category === null) {
          await ctx.reply(CANCELLED);
          return;
        }
        patch.category = category === '-' ? '' : category;
        break;
      }
      case 'edit:explanation': {
        await ctx.reply('💡 Send the new explanation, or "-" to remove it.');
        const explanation = await waitForText(conversation);
        if (explanation === null) {
          await ctx.reply(CANCELLED);
          return;
        }
        patch.explanation = explanation === '-' ? '' : explanation;
        break;
      }
    }

    const outcome = await conversation.external(() =>
      attempt(() => questions.editQuestion(id, patch), 'editing a question')
    );
    if (!outcome.ok) {
      await ctx.reply(outcome.message);
      return;
    }

    await ctx.reply(`✅ Question updated!\n\n${formatQuestionDetails(outcome.value)}`);
  };
}
