export type ArrayErrorMetaData = Record<string, string | number | null>;
export type ArrayErrorObject = ArrayErrorMetaData & { stack: string };

/**
 * Base error for contract violations on fixed-length sequences.
 * `type` carries a machine-readable `code` plus the numbers that broke the contract.
 */
export class ArrayError<T extends ArrayErrorMetaData & { code: string }> extends Error {
    readonly type: T;

    constructor(type: T, message?: string) {
        super(message || type.code);
        this.type = type;
        this.name = new.target.name;
    }

    getMetadata(): ArrayErrorMetaData {
        return { ...this.type };
    }

    /**
     * Get the metadata and the stacktrace for the error.
     */
    toObject(): ArrayErrorObject {
        return {
            // message is derived from the metadata
            ...this.getMetadata(),
            stack: this.stack || '',
        };
    }
}

export enum ArrayErrorCode {
    size = 'ERR_SIZE',
    subscript = 'ERR_SUBSCRIPT',
}

export type SizeErrorType = {
    code: ArrayErrorCode.size;
    length: number;
    maxLen: number;
};

export type SubscriptErrorType = {
    code: ArrayErrorCode.subscript;
    index: number;
    length: number;
};

/**
 * Thrown by a constructor when the requested length is negative,
 * not an integer, or larger than `maxLen`.
 */
export class SizeError extends ArrayError<SizeErrorType> {
    constructor(length: number, maxLen: number) {
        super(
            { code: ArrayErrorCode.size, length, maxLen },
            `Size: length ${length} is outside [0, ${maxLen}]`
        );
    }
}

/**
 * Thrown when an index, or the start of a copy range, falls outside the target.
 * For copies `index` is the start index and `length` the destination length.
 */
export class SubscriptError extends ArrayError<SubscriptErrorType> {
    constructor(index: number, length: number) {
        super(
            { code: ArrayErrorCode.subscript, index, length },
            `Subscript: index ${index} is out of bounds for length ${length}`
        );
    }
}

export function isSizeError(e: unknown): e is SizeError {
    return e instanceof SizeError;
}

export function isSubscriptError(e: unknown): e is SubscriptError {
    return e instanceof SubscriptError;
}
