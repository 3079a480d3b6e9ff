import { describe, it, expect } from 'vitest';
import { shellEscape, buildShellCommand, isSafeRepoSegment } from './shell-utils.js';

describe('shellEscape', () => {
    it('wraps plain strings in single quotes', () => {
        expect(shellEscape('main')).toBe("'main'");
        expect(shellEscape('feature x')).toBe("'feature x'");
    });

    it('escapes embedded single quotes', () => {
        expect(shellEscape("it's")).toBe("'it'\\''s'");
    });

    it('leaves substitutions literal', () => {
        expect(shellEscape('$(whoami)')).toBe("'$(whoami)'");
        expect(shellEscape('`id`')).toBe("'`id`'");
    });

    it('handles empty strings', () => {
        expect(shellEscape('')).toBe("''");
    });
});

describe('buildShellCommand', () => {
    it('keeps a plain program name bare and quotes every argument', () => {
        expect(buildShellCommand(['git', 'push', '-u', 'origin', 'feature-x'])).toBe(
            "git 'push' '-u' 'origin' 'feature-x'"
        );
    });

    it('quotes a program path with spaces', () => {
        expect(buildShellCommand(['/opt/my tools/gh', 'pr'])).toBe("'/opt/my tools/gh' 'pr'");
    });

    it('rejects an empty argv', () => {
        expect(() => buildShellCommand([])).toThrow('Cannot build an empty command');
    });
});

describe('isSafeRepoSegment', () => {
    it('accepts GitHub owner and repo names', () => {
        expect(isSafeRepoSegment('octocat')).toBe(true);
        expect(isSafeRepoSegment('hello-world.js')).toBe(true);
        expect(isSafeRepoSegment('my_repo')).toBe(true);
    });

    it('rejects traversal and shell characters', () => {
        expect(isSafeRepoSegment('..')).toBe(false);
        expect(isSafeRepoSegment('a;b')).toBe(false);
        expect(isSafeRepoSegment('')).toBe(false);
    });
});
