export const DEFAULT_MATRIX_SIZE = 200;
export const MAX_MATRIX_SIZE = 1000;

function randomMatrix(size: number, random: () => number): Float64Array {
    const matrix = new Float64Array(size * size);
    for (let i = 0; i < matrix.length; i++) matrix[i] = random();
    return matrix;
}

export function readMatrixSize(input: unknown): number {
    if (typeof input === 'number') return input;
    if (typeof input === 'object' && input !== null && 'size' in input && typeof input.size === 'number') {
        return input.size;
    }
    return DEFAULT_MATRIX_SIZE;
}

/**
 * Multiplies two random size×size matrices and returns the sum of every
 * element of the product. CPU-bound on purpose; runs on a worker thread.
 */
export function heavyComputation(input: unknown, random: () => number = Math.random): number {
    const size = readMatrixSize(input);
    if (!Number.isInteger(size) || size < 1) {
        throw new RangeError(`matrix size must be a positive integer, got ${size}`);
    }
    if (size > MAX_MATRIX_SIZE) {
        throw new RangeError(`matrix size ${size} exceeds the limit of ${MAX_MATRIX_SIZE}`);
    }

    const started = performance.now();
    const a = randomMatrix(size, random);
    const b = randomMatrix(size, random);
    const product = new Float64Array(size * size);

    // i-k-j order keeps the inner loop on contiguous rows
    for (let i = 0; i < size; i++) {
        const row = i * size;
        for (let k = 0; k < size; k++) {
            const aik = a[row + k];
            const bRow = k * size;
            for (let j = 0; j < size; j++) {
                product[row + j] += aik * b[bRow + j];
            }
        }
    }

    let sum = 0;
    for (let i = 0; i < product.length; i++) sum += product[i];

    console.log(`[activity] heavy_computation ${size}x${size}: sum=${sum} in ${(performance.now() - started).toFixed(2)}ms`);
    return sum;
}
