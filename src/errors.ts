export class MenuBotError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class MenuNodeNotFoundError extends MenuBotError {
    constructor(public readonly nodeId: number) {
        super(`Menu node ${nodeId} not found`);
    }
}

export class ContentStepNotFoundError extends MenuBotError {
    constructor(
        public readonly nodeId: number,
        public readonly position: number,
    ) {
        super(`Step ${position} of menu node ${nodeId} not found`);
    }
}

export class RankingRequestError extends MenuBotError {
    /**
     * @param status HTTP status returned by the ranking endpoint, when the
     * request got that far.
     */
    constructor(
        message: string,
        public readonly status?: number,
    ) {
        super(message);
    }
}

export class StorageNotReadyError extends MenuBotError {
    constructor(driver: string) {
        super(`Storage "${driver}" used before init()`);
    }
}

export const isNotFoundError = (
    error: unknown,
): error is MenuNodeNotFoundError | ContentStepNotFoundError =>
    error instanceof MenuNodeNotFoundError ||
    error instanceof ContentStepNotFoundError;
