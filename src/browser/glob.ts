const REGEX_SPECIALS = new Set(['\\', '^', '$', '.', '|', '+', '(', ')', '[', ']', '{', '}', '/', '?', '*']);

/**
 * Compiles a URL glob to an anchored RegExp.
 * `**` matches anything, `*` anything but `/`, `?` one character other
 * than `/`, and `{a,b}` either alternative.
 */
export function globToRegExp(glob: string): RegExp {
    const tokens: string[] = ['^'];
    let groupDepth = 0;

    for (let index = 0; index < glob.length; index += 1) {
        const char = glob[index];

        if (char === '*') {
            if (glob[index + 1] === '*') {
                while (glob[index + 1] === '*') {
                    index += 1;
                }
                tokens.push('.*');
            } else {
                tokens.push('[^/]*');
            }
            continue;
        }

        if (char === '?') {
            tokens.push('[^/]');
        } else if (char === '{') {
            groupDepth += 1;
            tokens.push('(?:');
        } else if (char === '}' && groupDepth > 0) {
            groupDepth -= 1;
            tokens.push(')');
        } else if (char === ',' && groupDepth > 0) {
            tokens.push('|');
        } else {
            tokens.push(REGEX_SPECIALS.has(char) ? `\\${char}` : char);
        }
    }

    if (groupDepth > 0) {
        throw new Error(`Unbalanced "{" in URL pattern: ${glob}`);
    }

    tokens.push('$');
    return new RegExp(tokens.join(''));
}
