import { describe, it, expect } from 'vitest';
import { mergeEnvironment, parseEnvFile } from './env';

describe('parseEnvFile', () => {
  it('parses assignments, skipping comments and blank lines', () => {
    const vars = parseEnvFile([
      '# Project',
      'PROJECT_NAME=demo',
      '',
      'export DISPLAY_NAME="Demo Project"',
      "REQUESTER='someone@redhat.com'",
      'MAX_WAIT_TIME = 600',
      'not an assignment',
    ].join('\n'));

    expect(vars).toEqual({
      PROJECT_NAME: 'demo',
      DISPLAY_NAME: 'Demo Project',
      REQUESTER: 'someone@redhat.com',
      MAX_WAIT_TIME: '600',
    });
  });

  it('keeps unmatched quotes and equals signs in values', () => {
    expect(parseEnvFile('A="open\nB=x=y')).toEqual({ A: '"open', B: 'x=y' });
  });
});

describe('mergeEnvironment', () => {
  it('lets non-empty environment values win over the file', () => {
    expect(mergeEnvironment(
      { PROJECT_NAME: 'from-file', POLL_INTERVAL: '10' },
      { PROJECT_NAME: 'from-env', POLL_INTERVAL: '', VERBOSE: 'true' }
    )).toEqual({ PROJECT_NAME: 'from-env', POLL_INTERVAL: '10', VERBOSE: 'true' });
  });
});
