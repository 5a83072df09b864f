import { describe, it, expect } from 'vitest';
import { ValidationError, shellQuote, splitArgs } from '@icepanel/utils';

describe('shellQuote', () => {
  it('should leave safe words unchanged', () => {
    expect(shellQuote('/usr/share/zoneinfo/Europe/Berlin')).toBe('/usr/share/zoneinfo/Europe/Berlin');
    expect(shellQuote('--force')).toBe('--force');
  });

  it('should quote empty strings and words with spaces', () => {
    expect(shellQuote('')).toBe("''");
    expect(shellQuote('2024-03-05 14:07:09')).toBe("'2024-03-05 14:07:09'");
  });

  it('should escape embedded single quotes', () => {
    expect(shellQuote("it's")).toBe(`'it'"'"'s'`);
  });
});

describe('splitArgs', () => {
  it('should split on runs of whitespace', () => {
    expect(splitArgs('  xterm   -e  top ')).toEqual(['xterm', '-e', 'top']);
  });

  it('should keep quoted words together', () => {
    expect(splitArgs(`sh -c 'echo "hi there"'`)).toEqual(['sh', '-c', 'echo "hi there"']);
    expect(splitArgs('notify-send "Backup done"')).toEqual(['notify-send', 'Backup done']);
  });

  it('should honour backslash escapes', () => {
    expect(splitArgs('ls My\\ Files')).toEqual(['ls', 'My Files']);
    expect(splitArgs('echo "a \\"b\\""')).toEqual(['echo', 'a "b"']);
  });

  it('should return an empty word for empty quotes', () => {
    expect(splitArgs("printf ''")).toEqual(['printf', '']);
  });

  it('should return nothing for blank input', () => {
    expect(splitArgs('   ')).toEqual([]);
  });

  it('should reject an unterminated quote', () => {
    expect(() => splitArgs('echo "oops')).toThrow(ValidationError);
    expect(() => splitArgs("echo 'oops")).toThrow('Unterminated single quote in: echo \'oops');
  });

  it('should split what shellQuote joined', () => {
    const words = ['xterm', '-title', "Bob's shell", ''];
    expect(splitArgs(words.map(shellQuote).join(' '))).toEqual(words);
  });
});
