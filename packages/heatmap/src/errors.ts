// ══════════════════════════════════════════════════════════════
//  Error taxonomy
//  EmptyInput / MissingRequiredField abort a rendering pass.
//  Missing data points and out-of-domain values never throw.
// ══════════════════════════════════════════════════════════════

export type HeatmapErrorCode =
    | 'EMPTY_INPUT'
    | 'MISSING_REQUIRED_FIELD'
    | 'INVALID_SERIES'
    | 'INVALID_COLOR_SCALE'
    | 'UNORDERED_GRIDS'
    | 'FETCH_FAILED';

export class HeatmapError extends Error {
    readonly code: HeatmapErrorCode;

    constructor(code: HeatmapErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class EmptyInputError extends HeatmapError {
    constructor(message = 'No data fetched. Check the ticker symbol and try again.') {
        super('EMPTY_INPUT', message);
    }
}

export class MissingRequiredFieldError extends HeatmapError {
    readonly field: string;

    constructor(field: string) {
        super('MISSING_REQUIRED_FIELD', `${field} price column not found in response`);
        this.field = field;
    }
}

export class InvalidSeriesError extends HeatmapError {
    constructor(message: string) {
        super('INVALID_SERIES', message);
    }
}

export class InvalidColorScaleError extends HeatmapError {
    constructor(message: string) {
        super('INVALID_COLOR_SCALE', message);
    }
}

export class UnorderedGridsError extends HeatmapError {
    constructor(message: string) {
        super('UNORDERED_GRIDS', message);
    }
}

export class FetchFailedError extends HeatmapError {
    readonly status: number | null;

    constructor(message: string, status: number | null = null) {
        super('FETCH_FAILED', message);
        this.status = status;
    }
}
