/**
 * An error with a status and a JSON `detail` payload sent back as-is.
 */
export class HttpError extends Error {
    readonly status: number;
    readonly detail: unknown;

    constructor(status: number, detail: unknown) {
        super(typeof detail === 'string' ? detail : JSON.stringify(detail));
        this.name = 'HttpError';
        this.status = status;
        this.detail = detail;
    }
}
