export class ConfigError extends Error {
    readonly variable: string;

    constructor(variable: string, message: string) {
        super(message);
        this.name = 'ConfigError';
        this.variable = variable;
    }
}

/** A caller-supplied argument could not be parsed. */
export class InvalidInputError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'InvalidInputError';
        this.field = field;
    }
}

export class ExportPathError extends Error {
    readonly targetPath: string;

    constructor(targetPath: string, message: string) {
        super(message);
        this.name = 'ExportPathError';
        this.targetPath = targetPath;
    }
}
