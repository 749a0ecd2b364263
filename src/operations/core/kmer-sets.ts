/**
 * Set algebra over k-mer sets
 *
 * The building blocks behind {@link KmerSet} and the similarity scorers. Every
 * function takes read-only string sets and iterates the smaller one when it
 * only needs membership tests against the other.
 *
 * @module operations/core/kmer-sets
 */

type Kmers = ReadonlySet<string>;

function orderBySize(setA: Kmers, setB: Kmers): [smaller: Kmers, larger: Kmers] {
  return setA.size <= setB.size ? [setA, setB] : [setB, setA];
}

/**
 * |A ∩ B| without materializing the intersection
 */
export function kmerIntersectionSize(setA: Kmers, setB: Kmers): number {
  const [smaller, larger] = orderBySize(setA, setB);
  let count = 0;
  for (const kmer of smaller) {
    if (larger.has(kmer)) count++;
  }
  return count;
}

/**
 * Intersection (A ∩ B)
 */
export function kmerIntersection(setA: Kmers, setB: Kmers): Set<string> {
  const [smaller, larger] = orderBySize(setA, setB);
  const result = new Set<string>();
  for (const kmer of smaller) {
    if (larger.has(kmer)) result.add(kmer);
  }
  return result;
}

/**
 * Union (A ∪ B)
 */
export function kmerUnion(setA: Kmers, setB: Kmers): Set<string> {
  const result = new Set<string>(setA);
  for (const kmer of setB) result.add(kmer);
  return result;
}

/**
 * Difference (A - B): k-mers in A but not in B
 */
export function kmerDifference(setA: Kmers, setB: Kmers): Set<string> {
  const result = new Set<string>();
  for (const kmer of setA) {
    if (!setB.has(kmer)) result.add(kmer);
  }
  return result;
}

/**
 * Jaccard similarity coefficient
 *
 * J(A, B) = |A ∩ B| / |A ∪ B|, with two empty sets counted as identical.
 */
export function kmerJaccard(setA: Kmers, setB: Kmers): number {
  if (setA.size === 0 && setB.size === 0) return 1;
  const shared = kmerIntersectionSize(setA, setB);
  return shared / (setA.size + setB.size - shared);
}

/**
 * Containment coefficient C(A, B) = |A ∩ B| / |A|
 */
export function kmerContainment(setA: Kmers, setB: Kmers): number {
  if (setA.size === 0) return 0;
  return kmerIntersectionSize(setA, setB) / setA.size;
}
