import path from 'path';
import {ConfigError, loadConfig} from './config';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({TELEGRAM_BOT_TOKEN: 'test-token'})).toEqual({
      botToken: 'test-token',
      dataDir: 'data',
      questionsFile: path.join('data', 'questions.json'),
      usersFile: path.join('data', 'users.json'),
      port: 5000,
      host: '0.0.0.0',
      sessionTimeoutSeconds: null,
      sessionSweepCron: '* * * * *',
    });
  });

  it('reads every setting', () => {
    const config = loadConfig({
      BOT_TOKEN: 'test-token',
      DATA_DIR: '/var/quiz',
      USERS_FILE: '/tmp/users.json',
      PORT: '8080',
      HOST: '127.0.0.1',
      SESSION_TIMEOUT_SECONDS: '300',
      SESSION_SWEEP_CRON: '*/5 * * * *',
    });

    expect(config.questionsFile).toBe(path.join('/var/quiz', 'questions.json'));
    expect(config.usersFile).toBe('/tmp/users.json');
    expect(config.port).toBe(8080);
    expect(config.host).toBe('127.0.0.1');
    expect(config.sessionTimeoutSeconds).toBe(300);
    expect(config.sessionSweepCron).toBe('*/5 * * * *');
  });

  it('requires a bot token', () => {
    expect(() => loadConfig({})).toThrow('TELEGRAM_BOT_TOKEN is not set in the environment');
  });

  it('treats a zero timeout as no expiry', () => {
    expect(loadConfig({TELEGRAM_BOT_TOKEN: 'test-token', SESSION_TIMEOUT_SECONDS: '0'}).sessionTimeoutSeconds)
      .toBeNull();
  });

  it.each([
    {PORT: 'abc'},
    {PORT: '70000'},
    {SESSION_TIMEOUT_SECONDS: '-5'},
    {SESSION_TIMEOUT_SECONDS: '1.5'},
  ])('rejects %p', (overrides) => {
    expect(() => loadConfig({TELEGRAM_BOT_TOKEN: 'test-token', ...overrides})).toThrow(ConfigError);
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({TELEGRAM_BOT_TOKEN: 'test-token', PORT: '70000'})).toThrow(
      'Invalid configuration: PORT must be between 0 and 65535'
    );
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({TELEGRAM_BOT_TOKEN: ' ', BOT_TOKEN: ' test-token ', PORT: '', HOST: '  '});

    expect(config.botToken).toBe('test-token');
    expect(config.port).toBe(5000);
    expect(config.host).toBe('0.0.0.0');
  });
});
