import { describe, it, expect, beforeEach } from 'vitest';
import { CommandParser } from '../command-parser.js';

describe('CommandParser', () => {
  let parser: CommandParser;

  beforeEach(() => {
    parser = new CommandParser();
  });

  describe('noise', () => {
    it.each(['Thank you.', 'hmm...', '(upbeat music)', '[Applause]', '   '])(
      'drops "%s" from voice input',
      (transcript) => {
        expect(parser.parse(transcript, 'voice').kind).toBe('noise');
      },
    );

    it('does not filter typed input', () => {
      expect(parser.parse('thanks')).toEqual({
        kind: 'instruction',
        text: 'thanks',
        instruction: 'thanks',
        addressedToAssistant: false,
      });
    });

    it('uses a configured blocklist', () => {
      const custom = new CommandParser({ noiseBlocklist: ['Background Chatter'] });
      expect(custom.parse('background chatter', 'voice').kind).toBe('noise');
      expect(custom.parse('thank you', 'voice').kind).toBe('instruction');
    });
  });

  describe('keystrokes', () => {
    it.each([
      ['yes', 'yes'],
      ['No.', 'no'],
      ['press enter', 'enter'],
      ['hit escape', 'escape'],
      ['esc', 'escape'],
      ['up', 'up'],
      ['Down', 'down'],
    ] as const)('maps "%s" to %s', (input, key) => {
      expect(parser.parse(input)).toEqual({ kind: 'keystroke', text: input, key });
    });

    it('keeps voice keystrokes that are not noise', () => {
      expect(parser.parse('Yes', 'voice')).toEqual({ kind: 'keystroke', text: 'Yes', key: 'yes' });
    });

    it('needs the key word on its own', () => {
      expect(parser.parse('yes do it').kind).toBe('instruction');
      expect(parser.parse('scroll up').kind).toBe('instruction');
    });
  });

  describe('interrupts', () => {
    it.each(['stop', 'Cancel!', 'never mind', 'nevermind', 'forget it', 'abort that'])(
      'treats "%s" as an interrupt',
      (input) => {
        expect(parser.parse(input).kind).toBe('interrupt');
      },
    );

    it('treats longer commands as instructions', () => {
      expect(parser.parse('stop the dev server now').kind).toBe('instruction');
    });

    it.each(['please stop', 'stop it', 'cancel that please'])('accepts the polite form "%s"', (input) => {
      expect(parser.parse(input).kind).toBe('interrupt');
    });

    it.each(['git merge --abort', 'git rebase --abort', 'docker stop web', 'systemctl stop nginx'])(
      'keeps the shell command "%s" as an instruction',
      (input) => {
        expect(parser.parse(input)).toEqual({
          kind: 'instruction',
          text: input,
          instruction: input,
          addressedToAssistant: false,
        });
      },
    );
  });

  describe('slash commands', () => {
    it('passes typed slash commands through', () => {
      expect(parser.parse('/review src/app.ts')).toEqual({
        kind: 'slash-command',
        text: '/review src/app.ts',
        command: '/review src/app.ts',
      });
    });

    it('turns a spoken "slash" into a slash command', () => {
      expect(parser.parse('slash doctor.', 'voice')).toEqual({
        kind: 'slash-command',
        text: 'slash doctor.',
        command: '/doctor',
      });
    });

    it('does not treat absolute paths as slash commands', () => {
      expect(parser.parse('/usr/bin/env node').kind).toBe('instruction');
    });
  });

  describe('assistant mode', () => {
    it.each([
      ['start claude mode', true],
      ['Enter Claude Code mode.', true],
      ['open the assistant session', true],
      ['exit claude mode', false],
      ['leave claude', false],
      ['quit claude code', false],
    ] as const)('parses "%s"', (input, active) => {
      expect(parser.parse(input)).toEqual({ kind: 'assistant-mode', text: input, active });
    });

    it('uses configured assistant names', () => {
      const custom = new CommandParser({ assistantNames: ['Robo'] });
      expect(custom.parse('start robo mode')).toEqual({
        kind: 'assistant-mode',
        text: 'start robo mode',
        active: true,
      });
      expect(custom.parse('start claude mode').kind).toBe('instruction');
    });
  });

  describe('instructions', () => {
    it.each([
      ['hey claude, explain the build script', 'explain the build script'],
      ['Claude: run the failing tests', 'run the failing tests'],
      ['ask claude to list the open ports', 'list the open ports'],
      ['tell Claude Code rename the helper', 'rename the helper'],
    ])('strips the address from "%s"', (input, instruction) => {
      expect(parser.parse(input)).toEqual({
        kind: 'instruction',
        text: input,
        instruction,
        addressedToAssistant: true,
      });
    });

    it('leaves assistant CLI invocations alone', () => {
      expect(parser.parse('claude init')).toEqual({
        kind: 'instruction',
        text: 'claude init',
        instruction: 'claude init',
        addressedToAssistant: false,
      });
    });

    it('trims the input', () => {
      expect(parser.parse('  git status  ')).toEqual({
        kind: 'instruction',
        text: 'git status',
        instruction: 'git status',
        addressedToAssistant: false,
      });
    });
  });
});
