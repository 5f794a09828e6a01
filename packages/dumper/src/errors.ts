/**
 * Wave dumper errors
 */

/**
 * Base class for all dumper errors
 */
export class DumperError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DumperError';
        // Maintain proper stack trace in V8
        Error.captureStackTrace?.(this, this.constructor);
    }
}

/**
 * Thrown when a dumper is attached to a hierarchy that has not been built
 */
export class HierarchyNotBuiltError extends DumperError {
    public readonly moduleName: string;

    constructor(moduleName: string) {
        super(`Module "${moduleName}" must be built before attaching a dumper. Call build() first.`);
        this.name = 'HierarchyNotBuiltError';
        this.moduleName = moduleName;
    }
}

/**
 * Thrown when two ports of one module resolve to the same output name.
 * Ports are never renamed, so this cannot be resolved automatically.
 */
export class NameConflictError extends DumperError {
    public readonly scope: string;
    public readonly conflictingName: string;

    constructor(scope: string, conflictingName: string) {
        super(`Port name "${conflictingName}" is claimed more than once in scope "${scope}"`);
        this.name = 'NameConflictError';
        this.scope = scope;
        this.conflictingName = conflictingName;
    }
}

/**
 * Thrown when a timestamp would be written out of order or twice
 */
export class TimestampOrderError extends DumperError {
    public readonly currentTime: number;
    public readonly reportedTime: number;

    constructor(currentTime: number, reportedTime: number) {
        super(`Timestamp ${reportedTime} cannot follow timestamp ${currentTime}`);
        this.name = 'TimestampOrderError';
        this.currentTime = currentTime;
        this.reportedTime = reportedTime;
    }
}

/**
 * Thrown when dumper options or environment variables fail validation
 */
export class ConfigValidationError extends DumperError {
    public readonly issues: string[];

    constructor(source: string, issues: string[]) {
        super(`${source} validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigValidationError';
        this.issues = issues;
    }
}
