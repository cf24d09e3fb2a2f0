const WINKLER_PREFIX_SCALE = 0.1;
const WINKLER_MAX_PREFIX = 4;
const WINKLER_BOOST_THRESHOLD = 0.7;

export function jaroSimilarity(left: string, right: string): number {
  if (left === right) {
    return 1;
  }

  if (left.length === 0 || right.length === 0) {
    return 0;
  }

  const a = Array.from(left);
  const b = Array.from(right);
  const window = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);

  const aMatched: boolean[] = new Array<boolean>(a.length).fill(false);
  const bMatched: boolean[] = new Array<boolean>(b.length).fill(false);
  let matches = 0;

  for (let i = 0; i < a.length; i += 1) {
    const start = Math.max(0, i - window);
    const end = Math.min(b.length - 1, i + window);

    for (let j = start; j <= end; j += 1) {
      if (bMatched[j] || a[i] !== b[j]) {
        continue;
      }

      aMatched[i] = true;
      bMatched[j] = true;
      matches += 1;
      break;
    }
  }

  if (matches === 0) {
    return 0;
  }

  let transpositions = 0;
  let k = 0;
  for (let i = 0; i < a.length; i += 1) {
    if (!aMatched[i]) {
      continue;
    }

    while (!bMatched[k]) {
      k += 1;
    }

    if (a[i] !== b[k]) {
      transpositions += 1;
    }
    k += 1;
  }

  const halfTranspositions = transpositions / 2;

  return (
    (matches / a.length + matches / b.length + (matches - halfTranspositions) / matches) / 3
  );
}

/**
 * Jaro-Winkler similarity in [0, 1]. Shared prefixes (up to four characters)
 * raise the score once the plain Jaro score is above 0.7.
 */
export function jaroWinklerSimilarity(left: string, right: string): number {
  const jaro = jaroSimilarity(left, right);
  if (jaro <= WINKLER_BOOST_THRESHOLD) {
    return jaro;
  }

  const a = Array.from(left);
  const b = Array.from(right);
  const limit = Math.min(WINKLER_MAX_PREFIX, a.length, b.length);
  let prefix = 0;
  while (prefix < limit && a[prefix] === b[prefix]) {
    prefix += 1;
  }

  return jaro + prefix * WINKLER_PREFIX_SCALE * (1 - jaro);
}
