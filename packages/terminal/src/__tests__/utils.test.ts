import { describe, it, expect, afterEach } from 'vitest';
import { stripAnsi, stripAnsiSimple, buildCleanEnv, shellEscape } from '../utils.js';

describe('stripAnsi', () => {
  it('removes CSI color codes', () => {
    expect(stripAnsi('\x1b[31mred\x1b[0m')).toBe('red');
  });

  it('removes CSI sequences with parameters', () => {
    expect(stripAnsi('\x1b[1;32;40mtext\x1b[0m')).toBe('text');
  });

  it('removes OSC sequences terminated by BEL', () => {
    expect(stripAnsi('\x1b]0;window title\x07rest')).toBe('rest');
  });

  it('removes OSC sequences terminated by ST', () => {
    expect(stripAnsi('\x1b]0;title\x1b\\rest')).toBe('rest');
  });

  it('removes DEC private mode sequences', () => {
    expect(stripAnsi('\x1b[?25hvisible\x1b[?25l')).toBe('visible');
  });

  it('removes charset escape sequences', () => {
    expect(stripAnsi('\x1b(Btext\x1b(0')).toBe('text');
  });

  it('removes simple escape sequences', () => {
    expect(stripAnsi('\x1bMtext')).toBe('text');
  });

  it('turns CRLF into LF', () => {
    expect(stripAnsi('one\r\ntwo\r\n')).toBe('one\ntwo\n');
  });

  it('keeps a prompt readable after cleaning', () => {
    const raw = '\x1b[1mDo you want to proceed?\x1b[22m \x1b[2m[y/n]\x1b[0m\r\n';
    expect(stripAnsi(raw)).toBe('Do you want to proceed? [y/n]\n');
  });

  it('passes through plain text unchanged', () => {
    expect(stripAnsi('hello world')).toBe('hello world');
  });
});

describe('stripAnsiSimple', () => {
  it('removes CSI color codes', () => {
    expect(stripAnsiSimple('\x1b[31mred\x1b[0m')).toBe('red');
  });

  it('does not remove OSC sequences', () => {
    const input = '\x1b]0;title\x07rest';
    expect(stripAnsiSimple(input)).toBe(input);
  });

  it('does not remove carriage returns', () => {
    expect(stripAnsiSimple('hello\rworld')).toBe('hello\rworld');
  });
});

describe('buildCleanEnv', () => {
  const originalEnv = process.env;

  afterEach(() => {
    process.env = originalEnv;
  });

  it('copies process.env values', () => {
    process.env = { PATH: '/usr/bin', HOME: '/home/user' };
    const env = buildCleanEnv();
    expect(env).toEqual({ PATH: '/usr/bin', HOME: '/home/user' });
  });

  it('filters out nested-session markers', () => {
    process.env = { PATH: '/usr/bin', CLAUDECODE: '1', CLAUDE_PARENT_CLI: 'true' };
    expect(buildCleanEnv()).toEqual({ PATH: '/usr/bin' });
  });

  it('lets extra vars override inherited ones', () => {
    process.env = { PATH: '/usr/bin' };
    expect(buildCleanEnv({ PATH: '/custom/bin', TERM: 'xterm-256color' })).toEqual({
      PATH: '/custom/bin',
      TERM: 'xterm-256color',
    });
  });
});

describe('shellEscape', () => {
  it('single-quotes the argument', () => {
    expect(shellEscape('fix the $HOME bug')).toBe("'fix the $HOME bug'");
  });

  it('escapes embedded single quotes', () => {
    expect(shellEscape("don't")).toBe("'don'\\''t'");
  });
});
