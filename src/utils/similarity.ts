type Block = { left: number; right: number; size: number };

/**
 * Ratio `2 * M / T` where `M` counts characters covered by greedy
 * longest-matching blocks and `T` is the combined length.
 *
 * The greedy alignment depends on argument order, so the pair is put in a
 * fixed order first and `similarity(a, b) === similarity(b, a)` always holds.
 */
export const similarity = (a: string, b: string): number => {
  const total = a.length + b.length;
  if (total === 0) return 1;
  if (a === b) return 1;

  const [left, right] = a <= b ? [a, b] : [b, a];
  return (2 * matchingCharacters(left, right)) / total;
};

export const matchingCharacters = (left: string, right: string): number => {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, left.length, 0, right.length]];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [leftStart, leftEnd, rightStart, rightEnd] = range;
    const block = longestBlock(left, right, leftStart, leftEnd, rightStart, rightEnd);
    if (block.size === 0) continue;

    matched += block.size;
    pending.push([leftStart, block.left, rightStart, block.right]);
    pending.push([block.left + block.size, leftEnd, block.right + block.size, rightEnd]);
  }

  return matched;
};

// Scanning order keeps the earliest block on ties.
const longestBlock = (
  left: string,
  right: string,
  leftStart: number,
  leftEnd: number,
  rightStart: number,
  rightEnd: number
): Block => {
  let best: Block = { left: leftStart, right: rightStart, size: 0 };
  let previous = new Array<number>(rightEnd - rightStart + 1).fill(0);

  for (let i = leftStart; i < leftEnd; i++) {
    const current = new Array<number>(rightEnd - rightStart + 1).fill(0);
    for (let j = rightStart; j < rightEnd; j++) {
      if (left[i] !== right[j]) continue;
      const size = (previous[j - rightStart] ?? 0) + 1;
      current[j - rightStart + 1] = size;
      if (size > best.size) {
        best = { left: i - size + 1, right: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
};
