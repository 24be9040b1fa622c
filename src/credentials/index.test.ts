import { jest } from '@jest/globals';
import { PassThrough } from 'stream';
import { PROMPTS, resolveCredentials } from './index';
import { createTerminalPrompter } from './prompt';
import type { Prompter } from './prompt';
import { CredentialsError } from '../utils/errors';
import { resetLogger } from '../utils/logger';

/**
 * Prompter that replays scripted answers and records what was asked
 */
function scriptedPrompter(answers: { ask?: string[]; askSecret?: string[] }) {
  const askAnswers = [...(answers.ask ?? [])];
  const secretAnswers = [...(answers.askSecret ?? [])];

  const prompter = {
    ask: jest.fn<Prompter['ask']>(async () => askAnswers.shift() ?? ''),
    askSecret: jest.fn<Prompter['askSecret']>(async () => secretAnswers.shift() ?? ''),
    close: jest.fn<Prompter['close']>(),
  };
  const createPrompter = jest.fn(() => prompter);

  return { prompter, createPrompter };
}

describe('resolveCredentials', () => {
  beforeEach(() => {
    resetLogger();
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should not prompt when the source provides both fields', async () => {
    const { createPrompter } = scriptedPrompter({});

    const credentials = await resolveCredentials(
      { pan: '12345678', password: 'test-secret' },
      createPrompter
    );

    expect(credentials).toEqual({ pan: '12345678', password: 'test-secret' });
    expect(createPrompter).not.toHaveBeenCalled();
  });

  it('should prompt only for a missing password, without echo', async () => {
    const { prompter, createPrompter } = scriptedPrompter({ ask: ['y'], askSecret: ['test-secret'] });

    const credentials = await resolveCredentials({ pan: '12345678' }, createPrompter);

    expect(credentials).toEqual({ pan: '12345678', password: 'test-secret' });
    expect(prompter.askSecret).toHaveBeenCalledWith(PROMPTS.PASSWORD);
    expect(prompter.ask).toHaveBeenCalledTimes(1);
    expect(prompter.ask).toHaveBeenCalledWith(PROMPTS.CONFIRM_PASSWORD);
    expect(prompter.close).toHaveBeenCalledTimes(1);
  });

  it('should prompt only for a missing PAN', async () => {
    const { prompter, createPrompter } = scriptedPrompter({ ask: [' 87654321 '] });

    const credentials = await resolveCredentials({ password: 'test-secret' }, createPrompter);

    expect(credentials).toEqual({ pan: '87654321', password: 'test-secret' });
    expect(prompter.ask).toHaveBeenCalledWith(PROMPTS.PAN);
    expect(prompter.askSecret).not.toHaveBeenCalled();
  });

  it('should prompt for both when the source is empty', async () => {
    const { prompter, createPrompter } = scriptedPrompter({
      ask: ['12345678', 'yes'],
      askSecret: ['test-secret'],
    });

    await expect(resolveCredentials({}, createPrompter)).resolves.toEqual({
      pan: '12345678',
      password: 'test-secret',
    });
    expect(prompter.ask.mock.calls.map(([question]) => question)).toEqual([
      PROMPTS.PAN,
      PROMPTS.CONFIRM_PASSWORD,
    ]);
  });

  it('should ask for the password again until it is confirmed', async () => {
    const { prompter, createPrompter } = scriptedPrompter({
      ask: ['n', 'Y'],
      askSecret: ['typo-secret', 'test-secret'],
    });

    const credentials = await resolveCredentials({ pan: '12345678' }, createPrompter);

    expect(credentials.password).toBe('test-secret');
    expect(prompter.askSecret).toHaveBeenCalledTimes(2);
  });

  it('should fail when the PAN is still missing after prompting', async () => {
    const { prompter, createPrompter } = scriptedPrompter({ ask: ['   '] });

    await expect(resolveCredentials({}, createPrompter)).rejects.toThrow(
      new CredentialsError('Unable to log into online banking without a PAN')
    );
    expect(prompter.askSecret).not.toHaveBeenCalled();
    expect(prompter.close).toHaveBeenCalledTimes(1);
  });

  it('should fail when the password is still missing after prompting', async () => {
    const { prompter, createPrompter } = scriptedPrompter({});

    const attempt = resolveCredentials({ pan: '12345678' }, createPrompter);

    await expect(attempt).rejects.toBeInstanceOf(CredentialsError);
    await expect(attempt).rejects.toMatchObject({ code: 2 });
    expect(prompter.close).toHaveBeenCalledTimes(1);
  });

  it('should read every answer from piped input', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    input.end('12345678\ntest-secret\ny\n');

    const credentials = await resolveCredentials({}, () => createTerminalPrompter({ input, output }));

    expect(credentials).toEqual({ pan: '12345678', password: 'test-secret' });
  });
});
