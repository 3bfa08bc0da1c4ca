// Broken task configuration: raised while building a score type.
export class ScoreTypeConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScoreTypeConfigError';
    }
}

// Stored data that does not match the configuration it is scored against.
export class DataIntegrityError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DataIntegrityError';
    }
}
