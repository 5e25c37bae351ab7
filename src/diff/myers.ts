export type LineOp = "equal" | "delete" | "insert";

export interface LineEdit {
  op: LineOp;
  line: string;
}

export interface DiffOptions {
  /** give up once the edit script would be longer than this */
  maxD?: number;
}

function chooseDown(v: Int32Array, k: number, d: number, offset: number): boolean {
  if (k === -d) return true;
  if (k === d) return false;
  const left = v[offset + k - 1] ?? -1;
  const right = v[offset + k + 1] ?? -1;
  return left < right;
}

/**
 * Shortest edit script between two line lists (Myers 1986). Deletions come
 * from `a`, insertions from `b`; on ties a deletion is emitted first.
 * Returns undefined when more than `maxD` edits are needed; memory grows
 * with the square of `maxD`.
 */
export function diffLines(
  a: readonly string[],
  b: readonly string[],
  options: DiffOptions = {}
): LineEdit[] | undefined {
  const n = a.length;
  const m = b.length;
  const maxD = Math.min(options.maxD ?? n + m, n + m);
  const offset = maxD + 1;
  let v = new Int32Array(offset * 2 + 1);
  v[offset + 1] = 0;
  const trace: Int32Array[] = [];

  let foundD = -1;
  for (let d = 0; d <= maxD && foundD < 0; d++) {
    const vNext = new Int32Array(v);
    for (let k = -d; k <= d; k += 2) {
      const down = chooseDown(v, k, d, offset);
      let x = down ? (v[offset + k + 1] ?? 0) : (v[offset + k - 1] ?? 0) + 1;
      let y = x - k;
      while (x < n && y < m && a[x] === b[y]) {
        x++;
        y++;
      }
      vNext[offset + k] = x;
      if (x >= n && y >= m) {
        foundD = d;
        break;
      }
    }
    trace.push(vNext);
    v = vNext;
  }

  if (foundD < 0) {
    return undefined;
  }

  const reversed: LineEdit[] = [];
  let x = n;
  let y = m;
  for (let d = foundD; d > 0; d--) {
    const vPrev = trace[d - 1];
    const k = x - y;
    const down = chooseDown(vPrev, k, d, offset);
    const prevK = down ? k + 1 : k - 1;
    const prevX = vPrev[offset + prevK] ?? 0;
    const prevY = prevX - prevK;

    while (x > prevX && y > prevY) {
      reversed.push({ op: "equal", line: a[x - 1] });
      x--;
      y--;
    }
    if (down) {
      reversed.push({ op: "insert", line: b[prevY] });
    } else {
      reversed.push({ op: "delete", line: a[prevX] });
    }
    x = prevX;
    y = prevY;
  }
  while (x > 0 && y > 0) {
    reversed.push({ op: "equal", line: a[x - 1] });
    x--;
    y--;
  }

  return reversed.reverse();
}
