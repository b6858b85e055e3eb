import { describe, it, expect } from 'vitest';
import {
  detectPrompt,
  lastNonEmptyLine,
  lastNonEmptyLineIndex,
  isPromptLine,
  inferSourceContext,
  extractPossibleResponses,
  hasCriticalImpact,
  buildClassifiedPrompt,
} from '../prompt-detector.js';
import { createDetectionRules, createPromptCatalog } from '../prompt-catalog.js';

describe('lastNonEmptyLine', () => {
  it('skips trailing blank lines', () => {
    expect(lastNonEmptyLine('first\nsecond\n\n   \n')).toBe('second');
  });

  it('handles CRLF output', () => {
    expect(lastNonEmptyLine('one\r\ntwo  \r\n')).toBe('two');
  });

  it('returns an empty string when there is no content', () => {
    expect(lastNonEmptyLine('')).toBe('');
    expect(lastNonEmptyLine('\n \n')).toBe('');
  });
});

describe('lastNonEmptyLineIndex', () => {
  it('counts lines from the top of the buffer', () => {
    expect(lastNonEmptyLineIndex('a\nP [y/n] y\nout\nP [y/n]\n\n')).toBe(3);
  });

  it('returns -1 for blank output', () => {
    expect(lastNonEmptyLineIndex(' \n')).toBe(-1);
  });
});

describe('isPromptLine', () => {
  it('matches trigger phrases as printed', () => {
    expect(isPromptLine('Are you sure you want to continue?')).toBe(true);
    expect(isPromptLine('Enter your API key:')).toBe(true);
    expect(isPromptLine('Continue? (y/n)')).toBe(true);
  });

  it('is case-sensitive', () => {
    expect(isPromptLine('are you sure you want to continue?')).toBe(false);
  });

  it('uses the rules it is given', () => {
    expect(isPromptLine('Apply patch?', createDetectionRules(['Apply patch']))).toBe(true);
    expect(isPromptLine('Apply patch?')).toBe(false);
  });
});

describe('inferSourceContext', () => {
  it('recognises each marker', () => {
    expect(inferSourceContext('$ claude init\n...')).toBe('initialization');
    expect(inferSourceContext('$ claude commit\n...')).toBe('git_commit');
    expect(inferSourceContext('> /review\n...')).toBe('code_review');
    expect(inferSourceContext('> /doctor\n...')).toBe('diagnostics');
  });

  it('checks markers in catalog order', () => {
    expect(inferSourceContext('> /review\n$ claude commit\n')).toBe('git_commit');
  });

  it('falls back to general', () => {
    expect(inferSourceContext('$ ls -la')).toBe('general');
  });
});

describe('extractPossibleResponses', () => {
  it('splits a bracket group', () => {
    expect(extractPossibleResponses('Continue? [y/n]')).toEqual(['y', 'n']);
  });

  it('splits a parenthesised group and trims tokens', () => {
    expect(extractPossibleResponses('Pick one (1 / 2 / 3)')).toEqual(['1', '2', '3']);
  });

  it('prefers the bracket group', () => {
    expect(extractPossibleResponses('Overwrite? (default n) [Y/n]')).toEqual(['Y', 'n']);
  });

  it('returns an empty list without a group', () => {
    expect(extractPossibleResponses('Enter your API key:')).toEqual([]);
  });
});

describe('hasCriticalImpact', () => {
  it('finds destructive words inside longer words', () => {
    expect(hasCriticalImpact('Permanently drop the table?')).toBe(true);
    expect(hasCriticalImpact('FORCE reinstall?')).toBe(true);
  });

  it('is false for harmless prompts', () => {
    expect(hasCriticalImpact('Do you want to see more examples?')).toBe(false);
  });

  it('uses the vocabulary of the given catalog', () => {
    const catalog = createPromptCatalog({ criticalVocabulary: ['drop'] });
    expect(hasCriticalImpact('Drop table users?', catalog)).toBe(true);
    expect(hasCriticalImpact('Delete it?', catalog)).toBe(false);
  });
});

describe('buildClassifiedPrompt', () => {
  it('builds a frozen record', () => {
    const prompt = buildClassifiedPrompt('Delete file server.js? [y/n]', 'code_review');
    expect(prompt).toEqual({
      text: 'Delete file server.js? [y/n]',
      sourceContext: 'code_review',
      criticalImpact: true,
      possibleResponses: ['y', 'n'],
    });
    expect(Object.isFrozen(prompt)).toBe(true);
    expect(Object.isFrozen(prompt.possibleResponses)).toBe(true);
  });
});

describe('detectPrompt', () => {
  it('returns null when the last line is not a prompt', () => {
    expect(detectPrompt('Do you want to continue? [y/n]\n$ ls\nREADME.md')).toBeNull();
  });

  it('returns null for empty output', () => {
    expect(detectPrompt('')).toBeNull();
  });

  it('builds a prompt from the last non-empty line', () => {
    const prompt = detectPrompt('$ claude init\nScanning project...\nDo you want to create a CLAUDE.md file? [y/n]\n\n');
    expect(prompt).toEqual({
      text: 'Do you want to create a CLAUDE.md file? [y/n]',
      sourceContext: 'initialization',
      criticalImpact: false,
      possibleResponses: ['y', 'n'],
    });
  });

  it('detects credential prompts without an option group', () => {
    const prompt = detectPrompt('Connecting...\nEnter your API key:');
    expect(prompt?.text).toBe('Enter your API key:');
    expect(prompt?.possibleResponses).toEqual([]);
    expect(prompt?.sourceContext).toBe('general');
  });
});
