import {
  NoActiveSessionError,
  NoQuestionsAvailableError,
  PollImportError,
  QuestionNotFoundError,
  StoreUnavailableError,
} from '../services/errors';
import {AnswerResult, Question} from '../types/quiz';
import {
  describeError,
  escapeHtml,
  formatCategories,
  formatPercent,
  formatPrompt,
  formatQuestionDetails,
  formatQuestionList,
  formatUserStats,
  formatVerdict,
  parseOptionLines,
  truncate,
} from './formatUtils';

function question(id: string, category: string, text = `Question ${id}`): Question {
  return {
    id,
    category,
    text,
    options: ['Paris', 'Rome'],
    correctIndex: 0,
    createdBy: 'system',
    createdAt: '2025-01-01T00:00:00.000Z',
  };
}

function result(overrides: Partial<AnswerResult> = {}): AnswerResult {
  return {
    questionId: '1',
    correct: true,
    chosenIndex: 0,
    correctIndex: 0,
    correctOption: 'Paris',
    stats: {userId: '42', answered: 2, correct: 1, categories: {}},
    accuracy: 0.5,
    ...overrides,
  };
}

describe('truncate', () => {
  it('cuts to the given length with an ellipsis', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abc', 4)).toBe('abc');
  });
});

describe('formatPercent', () => {
  it('rounds to one decimal', () => {
    expect(formatPercent(2 / 3)).toBe('66.7%');
    expect(formatPercent(0)).toBe('0.0%');
  });
});

describe('formatPrompt', () => {
  it('numbers the options and shows the category and id', () => {
    expect(formatPrompt({questionId: '1', category: 'Geography', text: 'Capital?', options: ['Paris', 'Rome']}))
      .toBe('❓ Capital?\n\n1. Paris\n2. Rome\n\n🏷 Geography · ID 1');
  });
});

describe('formatVerdict', () => {
  it('praises a correct answer', () => {
    expect(formatVerdict(result())).toBe(
      '✅ Correct!\n\n📊 Score: 1/2 (50.0%)\nUse /play to try another question.'
    );
  });

  it('names the correct option and the explanation after a wrong answer', () => {
    const wrong = result({
      correct: false,
      chosenIndex: 1,
      explanation: 'It is on the Seine',
      stats: {userId: '42', answered: 1, correct: 0, categories: {}},
      accuracy: 0,
    });

    expect(formatVerdict(wrong)).toBe(
      '❌ Wrong! The correct answer is: Paris\n\n' +
      '💡 It is on the Seine\n\n' +
      '📊 Score: 0/1 (0.0%)\nUse /play to try another question.'
    );
  });
});

describe('formatUserStats', () => {
  it('invites new players', () => {
    expect(formatUserStats({userId: '42', answered: 0, correct: 0, categories: {}}))
      .toBe("You haven't answered any quiz questions yet. Use /play to start a quiz!");
  });

  it('lists totals and categories', () => {
    expect(formatUserStats({
      userId: '42',
      answered: 3,
      correct: 2,
      categories: {Science: {answered: 2, correct: 2}, Art: {answered: 1, correct: 0}},
    })).toBe(
      '📊 Your quiz statistics\n\n' +
      'Total questions answered: 3\n' +
      'Correct answers: 2\n' +
      'Accuracy: 66.7%\n\n' +
      'By category:\n' +
      '• Art: 0/1\n' +
      '• Science: 2/2'
    );
  });
});

describe('formatQuestionList', () => {
  it('groups questions by category', () => {
    expect(formatQuestionList([question('1', 'Geography'), question('2', 'Art')])).toBe(
      '📋 Available quiz questions\n\n' +
      'Geography (1)\n- ID 1: Question 1\n\n' +
      'Art (1)\n- ID 2: Question 2\n\n' +
      'Use /play to play a random question, or /edit <ID> to edit one.'
    );
  });

  it('shows five questions per category', () => {
    const many = ['1', '2', '3', '4', '5', '6', '7'].map(id => question(id, 'Geography'));
    const text = formatQuestionList(many);

    expect(text).toContain('- ID 5: Question 5\n  ... and 2 more\n');
    expect(text).not.toContain('ID 6');
  });

  it('has a hint for an empty pool', () => {
    expect(formatQuestionList([])).toBe('No quiz questions available. Use /add to create some!');
  });
});

describe('formatQuestionDetails', () => {
  it('shows the correct option by text', () => {
    expect(formatQuestionDetails({...question('1', 'Geography', 'Capital?'), explanation: 'Seine'})).toBe(
      'ID: 1\nCategory: Geography\nQuestion: Capital?\n\n' +
      'Options:\n1. Paris\n2. Rome\n\n' +
      'Correct answer: Paris\nExplanation: Seine'
    );
  });
});

describe('formatCategories', () => {
  it('lists names with counts', () => {
    expect(formatCategories([{name: 'Art', questionCount: 2}])).toBe('🗂 Categories\n\n• Art (2)');
  });
});

describe('parseOptionLines', () => {
  it('drops blank lines and trims', () => {
    expect(parseOptionLines(' Paris \n\n Rome\n')).toEqual(['Paris', 'Rome']);
  });
});

describe('describeError', () => {
  it.each([
    [new NoQuestionsAvailableError(), '📭 No questions available. Add some with /add!'],
    [
      new NoQuestionsAvailableError('History'),
      '📭 No questions available in category "History". Use /categories to see what exists.',
    ],
    [new NoActiveSessionError('42'), '⚠️ This question is no longer active. Use /play to get a new one.'],
    [new QuestionNotFoundError('9'), '⚠️ Question 9 not found. Use /list to see available questions.'],
    [new PollImportError('Could not find a quiz in that post'), '⚠️ Could not find a quiz in that post'],
    [
      new StoreUnavailableError('data/users.json', new Error('EACCES')),
      '❌ Quiz data is unavailable right now. Please try again later.',
    ],
    [new Error('internal detail'), '❌ Something went wrong. Please try again later.'],
  ])('describes %s', (error, text) => {
    expect(describeError(error)).toBe(text);
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">&'`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&#39;');
  });
});
