// Prime number helpers
//
// Hit points of an entity at rest are prime (or zero), and armor
// identifiers must be prime. Hit points are small numbers; identifiers
// are 64-bit bigints, so they get a deterministic Miller-Rabin test.

/**
 * Check whether an integer is prime.
 */
export function isPrime(value: number): boolean {
  if (!Number.isInteger(value) || value < 2) return false;
  if (value < 4) return true;
  if (value % 2 === 0 || value % 3 === 0) return false;
  for (let i = 5; i * i <= value; i += 6) {
    if (value % i === 0 || value % (i + 2) === 0) return false;
  }
  return true;
}

/**
 * Largest prime strictly below the given value, or 0 when there is none.
 */
export function closestLowerPrime(value: number): number {
  for (let candidate = Math.floor(value) - 1; candidate >= 2; candidate--) {
    if (isPrime(candidate)) return candidate;
  }
  return 0;
}

/**
 * Round hit points down to the nearest value an entity at rest may have:
 * zero or a prime.
 */
export function normalizeHitPoints(hitPoints: number): number {
  if (hitPoints <= 0) return 0;
  if (isPrime(hitPoints)) return hitPoints;
  return closestLowerPrime(hitPoints);
}

// Witnesses that make Miller-Rabin exact for every n < 3.3 * 10^24
const MILLER_RABIN_BASES = [2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n];

function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  let result = 1n;
  let b = base % modulus;
  let e = exponent;
  while (e > 0n) {
    if ((e & 1n) === 1n) result = (result * b) % modulus;
    b = (b * b) % modulus;
    e >>= 1n;
  }
  return result;
}

/**
 * Check whether a 64-bit identifier is prime.
 */
export function isPrimeIdentifier(value: bigint): boolean {
  if (value < 2n) return false;
  for (const p of MILLER_RABIN_BASES) {
    if (value === p) return true;
    if (value % p === 0n) return false;
  }

  let d = value - 1n;
  let r = 0;
  while ((d & 1n) === 0n) {
    d >>= 1n;
    r++;
  }

  witness: for (const a of MILLER_RABIN_BASES) {
    let x = modPow(a, d, value);
    if (x === 1n || x === value - 1n) continue;
    for (let i = 1; i < r; i++) {
      x = (x * x) % value;
      if (x === value - 1n) continue witness;
    }
    return false;
  }
  return true;
}
