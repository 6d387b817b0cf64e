import { parseArguments, renderCommandLine } from '../../../src/shared/command-line.js';
import { InvalidArgumentError } from '../../../src/shared/errors.js';

describe('parseArguments', () => {
  it('keeps a double-quoted substring as one token', () => {
    expect(parseArguments('echo "hello world"')).toEqual(['echo', 'hello world']);
  });

  it('splits on runs of whitespace, tabs included', () => {
    expect(parseArguments('  ls \t -la   /tmp ')).toEqual(['ls', '-la', '/tmp']);
  });

  it('takes single-quoted text literally', () => {
    expect(parseArguments(`sh -c 'echo "$HOME" \\n'`)).toEqual(['sh', '-c', 'echo "$HOME" \\n']);
  });

  it('honours backslash escapes inside double quotes and outside quotes', () => {
    expect(parseArguments('printf "say \\"hi\\"" a\\ b')).toEqual(['printf', 'say "hi"', 'a b']);
  });

  it('joins quoted and unquoted parts that touch', () => {
    expect(parseArguments('--name="John Smith"x')).toEqual(['--name=John Smithx']);
  });

  it('produces an empty token for an empty quoted string', () => {
    expect(parseArguments('git commit -m ""')).toEqual(['git', 'commit', '-m', '']);
  });

  it('runs an unterminated quote to the end of the input', () => {
    expect(parseArguments('echo "open ended')).toEqual(['echo', 'open ended']);
  });

  it('returns no tokens for whitespace only', () => {
    expect(parseArguments('   ')).toEqual([]);
  });

  it('rejects an empty or missing command line', () => {
    expect(() => parseArguments('')).toThrow(InvalidArgumentError);
    expect(() => parseArguments(undefined)).toThrow('Missing command line');
    expect(() => parseArguments(null)).toThrow('Missing command line');
  });
});

describe('renderCommandLine', () => {
  it('prefixes every token with a space and quotes tokens with spaces', () => {
    expect(renderCommandLine(['echo', 'hello world'])).toBe(' echo "hello world"');
  });

  it('leaves plain tokens unquoted and unescaped', () => {
    expect(renderCommandLine(['ls', '-la', '/tmp'])).toBe(' ls -la /tmp');
  });

  it('escapes double quotes before deciding on quoting', () => {
    expect(renderCommandLine(['say', '"hi"'])).toBe(' say \\"hi\\"');
    expect(renderCommandLine(['say', 'a "b" c'])).toBe(' say "a \\"b\\" c"');
  });

  it('does not quote tokens that only contain tabs', () => {
    expect(renderCommandLine(['a\tb'])).toBe(' a\tb');
  });

  it('renders an empty token as a bare separator', () => {
    expect(renderCommandLine(['git', ''])).toBe(' git ');
  });
});
