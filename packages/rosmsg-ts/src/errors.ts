/*
 * Copyright (c) 2025 Andreas Michael
 * This software is under the Apache 2.0 License
 */

/**
 * An expected failure, returned rather than thrown, carrying the exit code the process should end with.
 */
export class GeneratorError {
    exitCode: number;
    message: string;
    error: Error | null;

    constructor(exitCode: number, message: string, error: Error | null) {
        this.exitCode = exitCode;
        this.message = message;
        this.error = error;
    }
}

export class InvalidSpecification extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidServiceSpecification extends InvalidSpecification {
}

export class InvalidResourceName extends InvalidSpecification {
}

export class InvalidFieldDefinition extends InvalidSpecification {
}

export class UnknownMessageType extends InvalidSpecification {
}

export class InvalidValue extends Error {
    constructor(type: string | { toString(): string }, valueString: string, messageSuffix?: string) {
        let message = "value '" + valueString + "' can not be converted to type '" + type.toString() + "'";
        if (messageSuffix !== undefined)
            message += ": " + messageSuffix;
        super(message);
        this.name = "InvalidValue";
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
