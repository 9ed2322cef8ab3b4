import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {Question} from '../types/quiz';
import {QuestionNotFoundError, StoreUnavailableError} from './errors';
import {JsonQuestionStore, SAMPLE_QUESTIONS} from './questionStore';

const extra: Question = {
  id: '3',
  category: 'Art',
  text: 'Who painted the Mona Lisa?',
  options: ['Da Vinci', 'Monet'],
  correctIndex: 0,
  createdBy: '42',
  createdAt: '2025-02-01T00:00:00.000Z',
};

describe('JsonQuestionStore', () => {
  let dir: string;
  let file: string;
  let store: JsonQuestionStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'quiz-questions-'));
    file = path.join(dir, 'nested', 'questions.json');
    store = new JsonQuestionStore(file);
  });

  afterEach(async () => {
    await fs.rm(dir, {recursive: true, force: true});
  });

  it('reads a missing file as empty', async () => {
    expect(await store.list()).toEqual([]);
    expect(await store.get('1')).toBeUndefined();
  });

  it('seeds the sample questions once', async () => {
    await store.init();
    expect(await store.list()).toEqual(SAMPLE_QUESTIONS);

    await store.delete('1');
    await store.init();
    expect((await store.list()).map(q => q.id)).toEqual(['2']);
  });

  it('appends, updates and deletes', async () => {
    await store.init();
    await store.append(extra);
    await store.update('3', {...extra, text: 'Who painted it?'});

    expect((await store.get('3'))?.text).toBe('Who painted it?');
    expect(await store.delete('3')).toBe(true);
    expect(await store.delete('3')).toBe(false);
    expect(await store.list()).toHaveLength(2);
  });

  it('refuses to update a missing question', async () => {
    await expect(store.update('9', extra)).rejects.toBeInstanceOf(QuestionNotFoundError);
  });

  it('keeps every one of concurrent appends', async () => {
    await Promise.all([
      store.append(extra),
      store.append({...extra, id: '4'}),
      store.append({...extra, id: '5'}),
    ]);

    expect((await store.list()).map(q => q.id)).toEqual(['3', '4', '5']);
  });

  it('writes plain JSON without leftover temp files', async () => {
    await store.append(extra);

    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual([extra]);
    expect(await fs.readdir(path.dirname(file))).toEqual(['questions.json']);
  });

  it('reports a corrupt file as unavailable', async () => {
    await fs.mkdir(path.dirname(file), {recursive: true});
    await fs.writeFile(file, '{not json');

    await expect(store.list()).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('reports a document of the wrong shape as unavailable', async () => {
    await fs.mkdir(path.dirname(file), {recursive: true});
    await fs.writeFile(file, JSON.stringify({questions: []}));

    await expect(store.list()).rejects.toThrow(`Store ${file} is unavailable: unexpected document shape`);
  });

  it('rejects a stored question whose correct index is out of range', async () => {
    await fs.mkdir(path.dirname(file), {recursive: true});
    await fs.writeFile(file, JSON.stringify([{...extra, options: ['A', 'B'], correctIndex: 5}]));

    await expect(store.list()).rejects.toThrow(StoreUnavailableError);
    await expect(store.get('3')).rejects.toThrow(
      `Store ${file} is unavailable: unexpected document shape at 0.correctIndex: ` +
      'correctIndex must point at one of the options'
    );
  });
});
