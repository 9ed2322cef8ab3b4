import {Menu} from '@grammyjs/menu';
import {startQuizForUser} from '../handlers/commands';
import {MyContext} from '../types/context';
import {CategorySummary} from '../types/quiz';
import {BotDeps} from '../types/deps';
import {logger} from '../utils/logger';

export const CATEGORY_MENU_ID = 'category-menu';

/**
 * Category picker shown by /categories. Tapping a category poses a random
 * question from it.
 */
export function createCategoryMenu(deps: BotDeps): Menu<MyContext> {
  return new Menu<MyContext>(CATEGORY_MENU_ID)
    .dynamic(async (_ctx, range) => {
      let categories: CategorySummary[];
      try {
        categories = await deps.questions.listCategories();
      } catch (error) {
        logger.error('Error while building the category menu', error);
        range.text('❌ Categories are unavailable', (ctx) => ctx.answerCallbackQuery());
        return;
      }

      if (categories.length === 0) {
        range.text('📭 No categories yet', (ctx) => ctx.answerCallbackQuery());
        return;
      }

      for (const category of categories) {
        const label = `${category.name} (${category.questionCount})`;

        range.text(label, async (ctx) => {
          await ctx.answerCallbackQuery();
          await startQuizForUser(ctx, deps.engine, category.name);
        }).row();
      }
    })
    .text('❌ Close', async (ctx) => {
      await ctx.answerCallbackQuery();
      await ctx.deleteMessage();
    });
}
