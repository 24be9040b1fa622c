import { PassThrough } from 'stream';
import { createTerminalPrompter } from './prompt';

function createStreams() {
  const input = new PassThrough();
  const output = new PassThrough();
  output.setEncoding('utf-8');
  const written = (): string => {
    const text: unknown = output.read();
    return typeof text === 'string' ? text : '';
  };
  return { input, output, written };
}

describe('createTerminalPrompter', () => {
  it('should read a line for a plain question', async () => {
    const { input, output, written } = createStreams();
    const prompter = createTerminalPrompter({ input, output });

    const answer = prompter.ask('PAN: ');
    input.write('12345678\n');

    await expect(answer).resolves.toBe('12345678');
    expect(written()).toBe('PAN: ');
    prompter.close();
  });

  it('should not write a secret answer to the output', async () => {
    const { input, output, written } = createStreams();
    const prompter = createTerminalPrompter({ input, output });

    const answer = prompter.askSecret('Password: ');
    input.write('test-secret\n');

    await expect(answer).resolves.toBe('test-secret');
    expect(written()).toBe('Password: \n');
    prompter.close();
  });

  it('should answer empty once the input is closed', async () => {
    const { input, output } = createStreams();
    const prompter = createTerminalPrompter({ input, output });

    const answer = prompter.ask('PAN: ');
    input.end();

    await expect(answer).resolves.toBe('');
    await expect(prompter.ask('again: ')).resolves.toBe('');
    prompter.close();
  });

  it('should hand out lines that arrive before they are asked for', async () => {
    const { input, output } = createStreams();
    const prompter = createTerminalPrompter({ input, output });

    input.end('12345678\ntest-secret\ny\n');

    await expect(prompter.ask('PAN: ')).resolves.toBe('12345678');
    await expect(prompter.askSecret('Password: ')).resolves.toBe('test-secret');
    await expect(prompter.ask('Happy? ')).resolves.toBe('y');
    await expect(prompter.ask('again: ')).resolves.toBe('');
    prompter.close();
  });

  describe('on a terminal', () => {
    function createTerminalStreams() {
      const streams = createStreams();
      return { ...streams, input: Object.assign(new PassThrough(), { isTTY: true }) };
    }

    it('should mute typed characters of a secret answer', async () => {
      const { input, output, written } = createTerminalStreams();
      const prompter = createTerminalPrompter({ input, output });

      const answer = prompter.askSecret('Password: ');
      input.write('test-secret\r');

      await expect(answer).resolves.toBe('test-secret');
      const text = written();
      expect(text).toContain('Password: ');
      expect(text).not.toContain('test-secret');
      prompter.close();
    });

    it('should not recall a secret answer with the up arrow', async () => {
      const { input, output, written } = createTerminalStreams();
      const prompter = createTerminalPrompter({ input, output });

      const secret = prompter.askSecret('Password: ');
      input.write('test-secret\r');
      await expect(secret).resolves.toBe('test-secret');

      const confirm = prompter.ask('Happy? ');
      input.write('\x1b[A');
      input.write('y\r');

      await expect(confirm).resolves.toBe('y');
      const text = written();
      expect(text).toContain('Happy? ');
      expect(text).not.toContain('test-secret');
      prompter.close();
    });
  });
});
