import {CommanderError} from 'commander';

import {
  ExitCode,
  ResponseFormatError,
  UNEXPECTED_FAILURE_EXIT_CODE,
  USAGE_EXIT_CODE,
  getFailureExitCode,
  parseArgs,
} from '../library/index.js';

beforeEach(() => {
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

function catchError(callback: () => unknown): unknown {
  try {
    callback();
  } catch (error) {
    return error;
  }

  throw new Error('Expected callback to throw');
}

test('rejects unknown options with the usage exit code', () => {
  const error = catchError(() => parseArgs(['--smtp', 'mail.example.com']));

  expect(error).toBeInstanceOf(CommanderError);
  expect(error).toMatchObject({code: 'commander.unknownOption'});
  expect(getFailureExitCode(error)).toBe(64);
});

test('rejects a missing option value with the usage exit code', () => {
  const error = catchError(() => parseArgs(['--zone']));

  expect(error).toMatchObject({code: 'commander.optionMissingArgument'});
  expect(getFailureExitCode(error)).toBe(64);
});

test('exits with the usage exit code after help', () => {
  const error = catchError(() => parseArgs(['--help']));

  expect(error).toMatchObject({code: 'commander.helpDisplayed'});
  expect(getFailureExitCode(error)).toBe(64);
});

test('exits with its own code on unexpected failures', () => {
  expect(getFailureExitCode(new ResponseFormatError('bad shape'))).toBe(70);
  expect(getFailureExitCode(new TypeError('bug'))).toBe(70);
});

test('keeps failure exit codes apart from run outcomes', () => {
  const outcomes: number[] = Object.values(ExitCode);

  expect(outcomes).not.toContain(USAGE_EXIT_CODE);
  expect(outcomes).not.toContain(UNEXPECTED_FAILURE_EXIT_CODE);
});
