export function hello(city: unknown): string {
    if (typeof city !== 'string' || city.length === 0) {
        throw new TypeError('hello expects a non-empty city name');
    }
    return `Hello ${city}`;
}
