import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Events, Outcome, type ICommandDispatcher } from '@promptgate/core';
import { EventBus } from '@promptgate/eventbus';
import { AutoResponder } from '../auto-responder.js';
import { InMemoryDecisionLog } from '../decision-log.js';
import { createPromptCatalog } from '../prompt-catalog.js';

function createDispatcher() {
  return {
    sendKeystroke: vi.fn(),
    sendInput: vi.fn(),
    runShellCommand: vi.fn(),
    sendAssistantTask: vi.fn(),
    requestHumanInput: vi.fn(),
  } satisfies ICommandDispatcher;
}

const INIT_OUTPUT = '$ claude init\nScanning project...\nDo you want to create a CLAUDE.md file? [y/n]\n';

describe('AutoResponder', () => {
  let log: InMemoryDecisionLog;
  let dispatcher: ReturnType<typeof createDispatcher>;
  let eventBus: EventBus;
  let responder: AutoResponder;

  beforeEach(() => {
    log = new InMemoryDecisionLog();
    dispatcher = createDispatcher();
    eventBus = new EventBus();
    responder = new AutoResponder({ log, dispatcher, eventBus });
  });

  it('approves a known-safe prompt', () => {
    const result = responder.handleOutput(INIT_OUTPUT);

    expect(result).toEqual({
      prompt: {
        text: 'Do you want to create a CLAUDE.md file? [y/n]',
        sourceContext: 'initialization',
        criticalImpact: false,
        possibleResponses: ['y', 'n'],
      },
      outcome: Outcome.yes,
      rule: 'auto-approve',
      responded: true,
    });
    expect(dispatcher.sendKeystroke).toHaveBeenCalledWith('yes');
    expect(dispatcher.requestHumanInput).not.toHaveBeenCalled();
  });

  it('declines a prompt on the decline list', () => {
    const result = responder.handleOutput('Do you want to erase cached previews? [y/n]');
    expect(result?.outcome).toEqual(Outcome.no);
    expect(dispatcher.sendKeystroke).toHaveBeenCalledWith('no');
  });

  it('escalates credential prompts without typing anything', () => {
    const result = responder.handleOutput('Connecting...\nEnter your API key:');

    expect(result?.outcome).toEqual(Outcome.abort);
    expect(result?.rule).toBe('require-user');
    expect(result?.responded).toBe(false);
    expect(dispatcher.sendKeystroke).not.toHaveBeenCalled();
    expect(dispatcher.sendInput).not.toHaveBeenCalled();
    expect(dispatcher.requestHumanInput).toHaveBeenCalledWith(result?.prompt);
  });

  it('escalates unknown prompts', () => {
    const result = responder.handleOutput('Do you want to install the recommended extension? [y/n]');
    expect(result?.rule).toBe('fallback');
    expect(dispatcher.requestHumanInput).toHaveBeenCalledTimes(1);
  });

  it('writes the log entry before answering', () => {
    let loggedBeforeKey = -1;
    dispatcher.sendKeystroke.mockImplementation(() => {
      loggedBeforeKey = log.size;
    });

    responder.handleOutput(INIT_OUTPUT);

    expect(loggedBeforeKey).toBe(1);
    expect(log.entries()[0]).toMatchObject({
      type: 'prompt',
      input: 'Do you want to create a CLAUDE.md file? [y/n]',
      outcome: { kind: 'yes' },
      sourceContext: 'initialization',
    });
  });

  it('returns null when there is no prompt', () => {
    expect(responder.handleOutput('$ ls\nREADME.md\n')).toBeNull();
    expect(log.size).toBe(0);
  });

  it('handles the same prompt once', () => {
    responder.handleOutput(INIT_OUTPUT);
    expect(responder.handleOutput(INIT_OUTPUT)).toBeNull();
    expect(dispatcher.sendKeystroke).toHaveBeenCalledTimes(1);
    expect(log.size).toBe(1);
  });

  it('ignores its own answer echoed on the prompt line', () => {
    responder.handleOutput(INIT_OUTPUT);
    const echoed = `${INIT_OUTPUT.trimEnd()} y\n`;
    expect(responder.handleOutput(echoed)).toBeNull();
    expect(dispatcher.sendKeystroke).toHaveBeenCalledTimes(1);
  });

  it('handles a repeated prompt again once the screen has moved on', () => {
    responder.handleOutput(INIT_OUTPUT);
    responder.handleOutput(`${INIT_OUTPUT}Created CLAUDE.md\n`);
    responder.handleOutput(INIT_OUTPUT);
    expect(dispatcher.sendKeystroke).toHaveBeenCalledTimes(2);
  });

  it('answers an identical prompt printed on a later line', () => {
    const prompt = 'Do you want to see more examples? [y/n]';
    const catalog = createPromptCatalog({ autoApprovePatterns: ['see more examples'] });
    const paging = new AutoResponder({ log, dispatcher, catalog });

    paging.handleOutput(`a\n${prompt}`);
    const second = paging.handleOutput(`a\n${prompt} y\nexample 1\nexample 2\n${prompt}`);

    expect(second?.responded).toBe(true);
    expect(dispatcher.sendKeystroke.mock.calls).toEqual([['yes'], ['yes']]);
    expect(log.size).toBe(2);
  });

  it('handles an identical prompt again after reset', () => {
    responder.handleOutput(INIT_OUTPUT);
    responder.reset();
    responder.handleOutput(INIT_OUTPUT);
    expect(dispatcher.sendKeystroke).toHaveBeenCalledTimes(2);
  });

  it('tags prompts with the context of the preceding output', () => {
    const result = responder.handleOutput('> /review\nWould you like to see more details? [y/n]');
    expect(result?.prompt.sourceContext).toBe('code_review');
    expect(log.entries()[0]).toMatchObject({ sourceContext: 'code_review' });
  });

  it('emits detected, decided and escalated events', () => {
    const seen: string[] = [];
    eventBus.on(Events.PROMPT_DETECTED, () => seen.push('detected'));
    eventBus.on(Events.PROMPT_DECIDED, () => seen.push('decided'));
    eventBus.on(Events.PROMPT_ESCALATED, () => seen.push('escalated'));

    responder.handleOutput('Please provide your password:');

    expect(seen).toEqual(['detected', 'escalated', 'decided']);
  });

  it('uses a substituted catalog', () => {
    const custom = new AutoResponder({
      log,
      dispatcher,
      catalog: createPromptCatalog({ autoApprovePatterns: ['install the recommended extension'] }),
    });
    const result = custom.handleOutput('Do you want to install the recommended extension? [y/n]');
    expect(result?.outcome).toEqual(Outcome.yes);
  });
});
