/**
 * Join items into a readable list: `one, two, three and four`.
 */
export function listJoin(items: Iterable<string>, connective = "and"): string {
  const list = [...items];
  return [...list.slice(0, -2), list.slice(-2).join(` ${connective} `)].join(", ");
}

/** Indefinite article for a word. */
export function article(word: string): "a" | "an" {
  return "aeiou".includes(word.charAt(0).toLowerCase()) ? "an" : "a";
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  const aLen = a.length;
  const bLen = b.length;
  if (aLen === 0) return bLen;
  if (bLen === 0) return aLen;

  let prev = new Array<number>(bLen + 1);
  let curr = new Array<number>(bLen + 1);
  for (let j = 0; j <= bLen; j++) {
    prev[j] = j;
  }

  for (let i = 1; i <= aLen; i++) {
    curr[0] = i;
    const aCode = a.charCodeAt(i - 1);
    for (let j = 1; j <= bLen; j++) {
      const cost = aCode === b.charCodeAt(j - 1) ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    const tmp = prev;
    prev = curr;
    curr = tmp;
  }

  return prev[bLen];
}

/**
 * Closest candidate to `input` by edit distance (case-insensitive).
 * Ties keep the earlier candidate.
 */
export function closestMatch(input: string, candidates: Iterable<string>): string | undefined {
  const needle = input.toLowerCase();
  let best: string | undefined;
  let bestScore = Infinity;
  for (const candidate of candidates) {
    const score = levenshteinDistance(needle, candidate.toLowerCase());
    if (score < bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `dd.mm.yyyy` and `HH:MM` in local time. */
export function formatDayAndTime(date: Date): { day: string; time: string } {
  return {
    day: `${pad2(date.getDate())}.${pad2(date.getMonth() + 1)}.${date.getFullYear()}`,
    time: `${pad2(date.getHours())}:${pad2(date.getMinutes())}`,
  };
}
