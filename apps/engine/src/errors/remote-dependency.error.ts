/** The text-generation service failed or returned nothing usable. */
export class RemoteDependencyError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RemoteDependencyError';
    }
}
