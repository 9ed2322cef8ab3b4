import express, {Express, Request, Response} from 'express';
import http from 'http';
import {StatsService} from '../services/statsService';
import {BotStats} from '../types/quiz';
import {escapeHtml, formatPercent} from '../utils/formatUtils';
import {logger} from '../utils/logger';

export interface StatusSources {
  stats: StatsService;
  activeSessions: () => number;
  isBotRunning: () => boolean;
}

const COMMANDS = [
  ['/play [category]', 'Play a random quiz question'],
  ['/categories', 'Pick a category to play'],
  ['/stats', 'View your quiz statistics'],
  ['/list', 'List all quiz questions'],
  ['/add', 'Create a new quiz question'],
  ['/clone <link>', 'Clone a quiz from a Telegram post'],
  ['/edit <id>', 'Edit an existing question'],
  ['/remove [id]', 'Delete a question'],
  ['/cancel', 'Cancel the current question or operation'],
];

export function createStatusApp(sources: StatusSources): Express {
  const app = express();

  app.get('/', async (_req: Request, res: Response) => {
    try {
      const stats = await sources.stats.getBotStats();
      res.type('html').send(renderStatusPage(stats, sources.activeSessions(), sources.isBotRunning()));
    } catch (error) {
      logger.error('Error while rendering the status page', error);
      res.status(503).type('html').send('<h1>Quiz data is unavailable</h1>');
    }
  });

  app.get('/api/stats', async (_req: Request, res: Response) => {
    try {
      const stats = await sources.stats.getBotStats();
      res.json({...stats, activeSessions: sources.activeSessions()});
    } catch (error) {
      logger.error('Error while reading statistics', error);
      res.status(503).json({error: 'Quiz data is unavailable'});
    }
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      botRunning: sources.isBotRunning(),
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

export function renderStatusPage(stats: BotStats, activeSessions: number, botRunning: boolean): string {
  const accuracy = stats.totalAnswered > 0 ? formatPercent(stats.totalCorrect / stats.totalAnswered) : '—';
  const categories = Object.entries(stats.categories)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, count]) => `<li>${escapeHtml(name)}: ${count}</li>`)
    .join('');
  const commands = COMMANDS
    .map(([command, description]) => `<li><code>${escapeHtml(command)}</code> ${escapeHtml(description)}</li>`)
    .join('');

  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Quiz Bot</title></head>
<body>
<h1>🎯 Quiz Bot</h1>
<p class="status">${botRunning ? '🟢 Online' : '🔴 Offline'}</p>
<ul class="stats">
<li>Questions: ${stats.totalQuestions}</li>
<li>Users: ${stats.totalUsers}</li>
<li>Answers: ${stats.totalAnswered}</li>
<li>Correct: ${stats.totalCorrect} (${accuracy})</li>
<li>Active sessions: ${activeSessions}</li>
</ul>
<h2>Categories</h2>
<ul class="categories">${categories || '<li>None yet</li>'}</ul>
<h2>Commands</h2>
<ul class="commands">${commands}</ul>
</body>
</html>
`;
}

export function startStatusServer(app: Express, port: number, host: string): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      logger.info(`Status server listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}
