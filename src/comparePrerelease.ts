export type Ordering = -1 | 0 | 1;

const numericIdentifierRegex = /^[0-9]+$/;

function compareStrings(a: string, b: string): Ordering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compares two digit-only identifiers by magnitude. Valid numeric identifiers have no leading
 * zeros, so a longer identifier is always the larger number.
 */
function compareNumericIdentifiers(a: string, b: string): Ordering {
  if (a.length !== b.length) {
    return a.length < b.length ? -1 : 1;
  }
  return compareStrings(a, b);
}

/**
 * Compares two pre-release identifiers. Numeric identifiers compare by value and always sort
 * before alphanumeric ones; alphanumeric identifiers compare by character code.
 */
export function compareIdentifiers(a: string, b: string): Ordering {
  const aIsNumeric = numericIdentifierRegex.test(a);
  const bIsNumeric = numericIdentifierRegex.test(b);
  if (aIsNumeric && bIsNumeric) {
    return compareNumericIdentifiers(a, b);
  }
  if (aIsNumeric) return -1;
  if (bIsNumeric) return 1;
  return compareStrings(a, b);
}

/**
 * Orders two pre-release fields. `undefined` stands for a release, which ranks above any
 * pre-release of the same core version.
 */
export function comparePrerelease(a: string | undefined, b: string | undefined): Ordering {
  if (a === undefined || b === undefined) {
    if (a === b) return 0;
    return a === undefined ? 1 : -1;
  }
  const identifiersA = a.split(".");
  const identifiersB = b.split(".");
  const sharedLength = Math.min(identifiersA.length, identifiersB.length);
  for (let i = 0; i < sharedLength; i++) {
    const result = compareIdentifiers(identifiersA[i], identifiersB[i]);
    if (result !== 0) return result;
  }
  // All shared identifiers are equal, the longer list wins
  if (identifiersA.length !== identifiersB.length) {
    return identifiersA.length < identifiersB.length ? -1 : 1;
  }
  return 0;
}
