/** Trial division up to √n; returns every prime in [2, limit]. */
export function calculatePrimes(limit: unknown): number[] {
    if (typeof limit !== 'number' || !Number.isInteger(limit)) {
        throw new TypeError(`calculate_primes expects an integer limit, got ${String(limit)}`);
    }

    const primes: number[] = [];
    for (let n = 2; n <= limit; n++) {
        let isPrime = true;
        for (let d = 2; d * d <= n; d++) {
            if (n % d === 0) {
                isPrime = false;
                break;
            }
        }
        if (isPrime) primes.push(n);
    }
    return primes;
}
