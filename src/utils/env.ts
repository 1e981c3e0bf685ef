/**
 * Parsers for plain key/value environment strings
 */

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

export function envString(value: string | undefined, defaultValue = ''): string {
    const trimmed = value?.trim();
    return trimmed ? trimmed : defaultValue;
}

export function envOptionalNumber(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
}

export function envOptionalInt(value: string | undefined): number | undefined {
    const parsed = envOptionalNumber(value);
    if (parsed === undefined) return undefined;
    return Number.isInteger(parsed) ? parsed : undefined;
}

interface Range {
    min?: number;
    max?: number;
}

function describeRange({ min, max }: Range): string {
    if (min !== undefined && max !== undefined) return ` between ${min} and ${max}`;
    if (min !== undefined) return ` of at least ${min}`;
    if (max !== undefined) return ` of at most ${max}`;
    return '';
}

function inRange(value: number, { min, max }: Range): boolean {
    return (min === undefined || value >= min) && (max === undefined || value <= max);
}

/**
 * Reads typed values from an environment, collecting a problem for every
 * value that is set but cannot be used. Unset or blank values take the default.
 */
export class EnvReader {
    readonly problems: string[] = [];
    private env: NodeJS.ProcessEnv;

    constructor(env: NodeJS.ProcessEnv) {
        this.env = env;
    }

    private raw(name: string): string | undefined {
        const value = this.env[name]?.trim();
        return value ? value : undefined;
    }

    private reject<T>(name: string, value: string, expected: string, fallback: T): T {
        this.problems.push(`${name} must be ${expected} (got "${value}")`);
        return fallback;
    }

    string(name: string, defaultValue = ''): string {
        return envString(this.env[name], defaultValue);
    }

    bool(name: string, defaultValue: boolean): boolean {
        const value = this.raw(name);
        if (value === undefined) return defaultValue;
        const normalized = value.toLowerCase();
        if (TRUE_VALUES.includes(normalized)) return true;
        if (FALSE_VALUES.includes(normalized)) return false;
        return this.reject(name, value, 'a boolean (1/0, true/false, yes/no, on/off)', defaultValue);
    }

    number(name: string, defaultValue: number, range: Range = {}): number {
        const value = this.raw(name);
        if (value === undefined) return defaultValue;
        const parsed = envOptionalNumber(value);
        if (parsed === undefined || !inRange(parsed, range)) {
            return this.reject(name, value, `a number${describeRange(range)}`, defaultValue);
        }
        return parsed;
    }

    int(name: string, defaultValue: number, range: Range = {}): number {
        const value = this.raw(name);
        if (value === undefined) return defaultValue;
        const parsed = envOptionalInt(value);
        if (parsed === undefined || !inRange(parsed, range)) {
            return this.reject(name, value, `an integer${describeRange(range)}`, defaultValue);
        }
        return parsed;
    }

    /**
     * Match a value case-insensitively against a fixed set of choices.
     */
    choice<T extends string>(name: string, choices: readonly T[], defaultValue: T): T {
        const value = this.raw(name);
        if (value === undefined) return defaultValue;
        const normalized = value.toLowerCase();
        const match = choices.find((choice) => choice === normalized);
        return match ?? this.reject(name, value, `one of ${choices.join(', ')}`, defaultValue);
    }
}
