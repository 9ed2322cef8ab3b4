import {PollImportService} from '../services/pollImportService';
import {QuestionService} from '../services/questionService';
import {QuizEngine} from '../services/quizEngine';

/** Everything the bot handlers need, built once at start-up. */
export interface BotDeps {
  engine: QuizEngine;
  questions: QuestionService;
  pollImporter: PollImportService;
}
