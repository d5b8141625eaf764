/**
 * Bound descriptors attached to integer, float and string options.
 *
 * They are descriptive metadata: the bounds are sent to Discord with the
 * command schema and Discord enforces them client-side. Nothing here
 * re-validates incoming values.
 */

import { ConfigurationError } from '../errors/errors.js';

function assertOrdered(kind: string, min: number | undefined, max: number | undefined, labels: [string, string]) {
    if (min !== undefined && max !== undefined && min > max) {
        throw new ConfigurationError(`${kind}: ${labels[0]} (${min}) cannot be greater than ${labels[1]} (${max})`);
    }
}

export class IntegerBounds {
    readonly kind = 'integer' as const;
    readonly minValue?: number;
    readonly maxValue?: number;

    constructor(init: { minValue?: number; maxValue?: number } = {}) {
        for (const [label, value] of [['minValue', init.minValue], ['maxValue', init.maxValue]] as const) {
            if (value !== undefined && !Number.isInteger(value)) {
                throw new ConfigurationError(`IntegerBounds: ${label} must be an integer, got ${value}`);
            }
        }
        assertOrdered('IntegerBounds', init.minValue, init.maxValue, ['minValue', 'maxValue']);
        this.minValue = init.minValue;
        this.maxValue = init.maxValue;
    }
}

export class FloatBounds {
    readonly kind = 'float' as const;
    readonly minValue?: number;
    readonly maxValue?: number;

    constructor(init: { minValue?: number; maxValue?: number } = {}) {
        for (const [label, value] of [['minValue', init.minValue], ['maxValue', init.maxValue]] as const) {
            if (value !== undefined && !Number.isFinite(value)) {
                throw new ConfigurationError(`FloatBounds: ${label} must be a finite number, got ${value}`);
            }
        }
        assertOrdered('FloatBounds', init.minValue, init.maxValue, ['minValue', 'maxValue']);
        this.minValue = init.minValue;
        this.maxValue = init.maxValue;
    }
}

export class StringBounds {
    readonly kind = 'string' as const;
    readonly minLength?: number;
    readonly maxLength?: number;

    constructor(init: { minLength?: number; maxLength?: number } = {}) {
        for (const [label, value] of [['minLength', init.minLength], ['maxLength', init.maxLength]] as const) {
            if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
                throw new ConfigurationError(`StringBounds: ${label} must be a non-negative integer, got ${value}`);
            }
        }
        assertOrdered('StringBounds', init.minLength, init.maxLength, ['minLength', 'maxLength']);
        this.minLength = init.minLength;
        this.maxLength = init.maxLength;
    }
}

export type OptionBounds = IntegerBounds | FloatBounds | StringBounds;
