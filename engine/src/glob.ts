export const normalizePath = (value: string): string => value.replace(/\\/g, '/');

export const isGlob = (pattern: string): boolean => /[*?]/.test(pattern);

export const globToRegExp = (pattern: string): RegExp => {
  let regex = '^';
  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    if (char === '*') {
      if (pattern[i + 1] === '*') {
        while (pattern[i + 1] === '*') {
          i += 1;
        }
        if (pattern[i + 1] === '/') {
          i += 1;
          regex += '(?:.*/)?';
        } else {
          regex += '.*';
        }
      } else {
        regex += '[^/]*';
      }
      continue;
    }

    if (char === '?') {
      regex += '[^/]';
      continue;
    }

    if (/[.+^${}()|[\]\\]/.test(char)) {
      regex += `\\${char}`;
    } else {
      regex += char;
    }
  }
  regex += '$';
  return new RegExp(regex);
};

/**
 * True when `filePath` is `pattern` itself, or matches it as a glob.
 */
export function matchesPattern(pattern: string, filePath: string): boolean {
  const normalizedPattern = normalizePath(pattern);
  const normalizedPath = normalizePath(filePath);
  if (!isGlob(normalizedPattern)) {
    return normalizedPattern === normalizedPath;
  }
  return globToRegExp(normalizedPattern).test(normalizedPath);
}
