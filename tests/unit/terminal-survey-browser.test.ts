import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { TerminalSurveyBrowser } from '../../src/infra/terminal-survey-browser.js';
import { ErrorCode, OperationCancelledError } from '../../src/utils/errors.js';

function createBrowser(pager = 'less') {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });
  const browser = new TerminalSurveyBrowser({ pager, pagerArgs: ['-SFX'], input, output });
  return { browser, input, output: () => written };
}

describe('TerminalSurveyBrowser', () => {
  it('should return the typed line', async () => {
    const { browser, input } = createBrowser();

    const answer = browser.promptLine('line? ');
    input.write('7\n');

    await expect(answer).resolves.toBe('7');
  });

  it('should show the prompt and invalid-input messages', async () => {
    const { browser, input, output } = createBrowser();

    const answer = browser.promptLine('line? ');
    input.write('x\n');
    await answer;
    browser.reportInvalid('error: response not a positive integer.');
    await new Promise(resolve => setImmediate(resolve));

    expect(output()).toContain('line? ');
    expect(output().endsWith('error: response not a positive integer.\n')).toBe(true);
  });

  it('should cancel when input ends', async () => {
    const { browser, input } = createBrowser();

    const answer = browser.promptLine('line? ');
    input.end();

    await expect(answer).rejects.toBeInstanceOf(OperationCancelledError);
    await expect(answer).rejects.toMatchObject({ code: ErrorCode.OPERATION_CANCELLED });
  });

  it('should keep answers that arrive in a single chunk', async () => {
    const { browser, input, output } = createBrowser('vendormac-missing-pager');
    input.write('\nabc\n3\n');

    await browser.render(['1   wlan  laptop  Acme  Book  100  00 1A 2B']);
    const first = await browser.promptLine('line? ');
    const second = await browser.promptLine('line? ');
    browser.close();

    expect([first, second]).toEqual(['abc', '3']);
    expect(output()).toContain('1   wlan  laptop  Acme  Book  100  00 1A 2B\n');
  });

  it('should cancel once queued answers run out at end of input', async () => {
    const { browser, input } = createBrowser();
    input.end('5\n');

    await expect(browser.promptLine('line? ')).resolves.toBe('5');
    await expect(browser.promptLine('line? ')).rejects.toBeInstanceOf(OperationCancelledError);
  });
});
