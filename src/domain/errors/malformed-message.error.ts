export class MalformedMessageError extends Error {
    constructor(
        public readonly rawMessage: string,
        reason: string,
    ) {
        super(`Malformed scheduled message: ${reason}`);
        this.name = "MalformedMessageError";
    }
}
