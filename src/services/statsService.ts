import {BotStats} from '../types/quiz';
import {QuestionStore} from './questionStore';
import {UserStore} from './userStore';

export const UNCATEGORIZED = 'Uncategorized';

/**
 * Process-wide summary for the status page. Recomputed from both stores on
 * every call.
 */
export class StatsService {
  constructor(
    private readonly questions: QuestionStore,
    private readonly users: UserStore
  ) {}

  async getBotStats(): Promise<BotStats> {
    const [questions, users] = await Promise.all([this.questions.list(), this.users.list()]);

    const categories: Record<string, number> = {};
    for (const question of questions) {
      const category = question.category.trim() || UNCATEGORIZED;
      categories[category] = (categories[category] ?? 0) + 1;
    }

    let totalAnswered = 0;
    let totalCorrect = 0;
    for (const user of users) {
      totalAnswered += user.answered;
      totalCorrect += user.correct;
    }

    return {
      totalQuestions: questions.length,
      totalUsers: users.length,
      totalAnswered,
      totalCorrect,
      categories,
    };
  }
}
