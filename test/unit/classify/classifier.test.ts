import {
  categorizeFailure,
  classify,
  errorLines,
  errorTextOf,
  extractArtifactPath,
} from '../../../src/classify/classifier.js';
import { ErrorCategory } from '../../../src/types/outcome.js';
import type { CommandResult } from '../../../src/types/command.js';

function failed(stderr: string, stdout = ''): CommandResult {
  return { logicalCommand: 'compile blink', command: 'arduino-cli compile blink', success: false, stdout, stderr };
}

describe('categorizeFailure', () => {
  it('recognises linker errors', () => {
    expect(categorizeFailure("blink.ino:12: undefined reference to `foo'")).toBe(ErrorCategory.UndefinedReference);
  });

  it('recognises missing headers', () => {
    expect(categorizeFailure('fatal error: Servo.h: No such file or directory')).toBe(ErrorCategory.MissingDependency);
  });

  it('recognises missing libraries case-insensitively', () => {
    expect(categorizeFailure('Error: Library "FastLED" NOT FOUND')).toBe(ErrorCategory.MissingDependency);
  });

  it('recognises unknown boards', () => {
    expect(categorizeFailure('Error during build: Unknown FQBN: board arduino:avr:foo not found'))
      .toBe(ErrorCategory.UnsupportedTarget);
    expect(categorizeFailure('Invalid FQBN: unknown BOARD')).toBe(ErrorCategory.UnsupportedTarget);
  });

  it('checks dependencies before boards', () => {
    expect(categorizeFailure('unknown board; fatal error: Wire.h: No such file or directory'))
      .toBe(ErrorCategory.MissingDependency);
  });

  it('checks linker errors before everything else', () => {
    expect(categorizeFailure('undefined reference to `setup2\'\nNo such file or directory\nunknown board'))
      .toBe(ErrorCategory.UndefinedReference);
  });

  it('defaults to a syntax error', () => {
    expect(categorizeFailure("error: expected ';' before '}' token")).toBe(ErrorCategory.SyntaxError);
    expect(categorizeFailure('')).toBe(ErrorCategory.SyntaxError);
  });
});

describe('extractArtifactPath', () => {
  it('reads the line after "Sketch uses"', () => {
    expect(extractArtifactPath('Sketch uses 1024 bytes\nfoo.ino.hex\n')).toBe('foo.ino.hex');
  });

  it('handles CRLF output', () => {
    expect(extractArtifactPath('Sketch uses 1024 bytes\r\n/b/foo.ino.hex\r\n')).toBe('/b/foo.ino.hex');
  });

  it('reads CRLF output with a storage summary on the first line', () => {
    expect(
      extractArtifactPath('Sketch uses 924 bytes (2%) of program storage space.\r\nC:\\b\\blink.ino.hex\r\nGlobal variables use 9 bytes\r\n'),
    ).toBe('C:\\b\\blink.ino.hex');
  });

  it('is empty when the tool does not name an artifact', () => {
    expect(extractArtifactPath('Sketch uses 1024 bytes (3%) of program storage space.\nGlobal variables use 9 bytes\n'))
      .toBe('');
    expect(extractArtifactPath('')).toBe('');
  });
});

describe('classify', () => {
  it('extracts artifacts only for compile', () => {
    const result: CommandResult = { logicalCommand: 'compile blink', command: 'c', success: true, stdout: 'Sketch uses 1024 bytes\nfoo.ino.hex\n', stderr: '' };
    expect(classify(result, 'compile')).toEqual({
      success: true,
      errorCategory: ErrorCategory.None,
      artifactPath: 'foo.ino.hex',
    });
    expect(classify(result, 'upload').artifactPath).toBe('');
  });

  it('classifies stderr when present', () => {
    expect(classify(failed("undefined reference to `foo'"), 'compile')).toEqual({
      success: false,
      errorCategory: ErrorCategory.UndefinedReference,
      artifactPath: '',
    });
  });

  it('searches stdout when stderr is empty', () => {
    const outcome = classify(failed('  \n', 'Compiling...\nfatal error: Servo.h: No such file or directory\n'), 'compile');
    expect(outcome.errorCategory).toBe(ErrorCategory.MissingDependency);
  });

  it('ignores stdout when stderr has content', () => {
    const outcome = classify(failed("error: expected ')'", "undefined reference to `foo'"), 'compile');
    expect(outcome.errorCategory).toBe(ErrorCategory.SyntaxError);
  });
});

describe('error text helpers', () => {
  it('errorTextOf prefers stderr', () => {
    expect(errorTextOf({ stdout: 'out', stderr: 'err' })).toBe('err');
    expect(errorTextOf({ stdout: 'out', stderr: '' })).toBe('out');
  });

  it('errorLines keeps only compiler error lines', () => {
    expect(errorLines('a\nblink.ino:3:1: error: x\nb\nerror: y')).toEqual(['blink.ino:3:1: error: x', 'error: y']);
  });
});
