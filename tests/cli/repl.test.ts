import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Readable, Writable } from 'node:stream';
import { runRepl, DEFAULT_PROMPT } from '../../src/cli/repl.js';
import { createRouter, type Dispatch } from '../../src/commands/router.js';
import { createContainer, type Container } from '../../src/container.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

function lines(...input: string[]): Readable {
  return Readable.from(input.map((line) => `${line}\n`));
}

describe('runRepl', () => {
  let container: Container;

  beforeEach(() => {
    container = createContainer(DEFAULT_CONFIG, new ConsoleLogProvider());
  });

  it('should print one result per line until exit', async () => {
    const out = collector();

    await runRepl({
      input: lines('hello', 'add Bob 1234567890', 'exit', 'add Eve 0987654321'),
      output: out.stream,
      dispatch: createRouter(container),
      prompt: '> ',
    });

    expect(out.text()).toBe(
      '> How can I help you?\n> Contact Bob added with phone 1234567890\n> Good bye!\n'
    );
    expect(container.addressBook.size).toBe(1);
  });

  it('should stop when the input ends', async () => {
    const out = collector();

    await runRepl({
      input: lines('hello'),
      output: out.stream,
      dispatch: createRouter(container),
      prompt: '> ',
    });

    expect(out.text()).toBe('> How can I help you?\n> ');
  });

  it('should not print anything for blank lines', async () => {
    const out = collector();

    await runRepl({
      input: lines('', 'close'),
      output: out.stream,
      dispatch: createRouter(container),
      prompt: '> ',
    });

    expect(out.text()).toBe('> > Good bye!\n');
  });

  it('should use the default prompt', async () => {
    const out = collector();

    await runRepl({
      input: lines('exit'),
      output: out.stream,
      dispatch: createRouter(container),
    });

    expect(out.text()).toBe(`${DEFAULT_PROMPT}Good bye!\n`);
  });

  it('should pass the clock reading to each command', async () => {
    const out = collector();
    const now = new Date(2025, 4, 18);
    const dispatch = vi.fn<Dispatch>(() => ({ status: 'exit', output: '' }));

    await runRepl({
      input: lines('birthday Bob'),
      output: out.stream,
      dispatch,
      prompt: '',
      clock: () => now,
    });

    expect(dispatch).toHaveBeenCalledWith('birthday Bob', { now });
  });
});
