import type { Ksuid } from './ksuid';

export function compare(a: Ksuid, b: Ksuid): -1 | 0 | 1 {
  return a.compare(b);
}

/** Sorts ids in place and returns the same array. */
export function sort(ids: Ksuid[]): Ksuid[] {
  quickSort(ids, 0, ids.length - 1);
  return ids;
}

export function isSorted(ids: readonly Ksuid[]): boolean {
  for (let i = 1; i < ids.length; i++) {
    if (compare(ids[i - 1], ids[i]) > 0) {
      return false;
    }
  }
  return true;
}

function swap(a: Ksuid[], i: number, j: number): void {
  const tmp = a[i];
  a[i] = a[j];
  a[j] = tmp;
}

// Lomuto partition around the last element
function quickSort(a: Ksuid[], lo: number, hi: number): void {
  while (lo < hi) {
    const pivot = a[hi];
    let i = lo;
    for (let j = lo; j < hi; j++) {
      if (compare(a[j], pivot) < 0) {
        swap(a, i, j);
        i++;
      }
    }
    swap(a, i, hi);

    // Recurse into the smaller side to keep the stack shallow
    if (i - lo < hi - i) {
      quickSort(a, lo, i - 1);
      lo = i + 1;
    } else {
      quickSort(a, i + 1, hi);
      hi = i - 1;
    }
  }
}
