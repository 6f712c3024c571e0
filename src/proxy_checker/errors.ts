export class ProbeResponseError extends Error {
    constructor(message: string) {
        super(`${ ProbeResponseError.name }: ${ message }`);
    }
}
