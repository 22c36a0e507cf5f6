import * as yup from 'yup';
import {
    MAX_LABEL_LENGTH,
    MAX_STEP_DELAY,
    MIN_STEP_DELAY,
} from '../app.constants';
import type { TRejectionReason } from './authoring.state';

export type TValidationResult<T> =
    | { valid: true; value: T }
    | { valid: false; reason: TRejectionReason };

const INTEGER_PATTERN = /^-?\d+$/;

// Counted in code points: emoji take two UTF-16 units each.
const labelSchema = yup
    .string()
    .trim()
    .required()
    .test(
        'max',
        `at most ${MAX_LABEL_LENGTH} characters`,
        (value) => [...(value ?? '')].length <= MAX_LABEL_LENGTH,
    );

const textSchema = yup.string().trim().required();

const failedTestOf = (error: unknown): string | undefined => {
    if (error instanceof yup.ValidationError) {
        return error.type;
    }
    throw error;
};

const validateInteger = (
    raw: string,
    min: number,
    max: number,
    reasons: { notInteger: TRejectionReason; outOfRange: TRejectionReason },
): TValidationResult<number> => {
    const trimmed = raw.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        return { valid: false, reason: reasons.notInteger };
    }

    try {
        const value = yup
            .number()
            .required()
            .integer()
            .min(min)
            .max(max)
            .validateSync(Number(trimmed));
        return { valid: true, value };
    } catch (error) {
        failedTestOf(error);
        return { valid: false, reason: reasons.outOfRange };
    }
};

export const validateLabel = (raw: string): TValidationResult<string> => {
    try {
        return { valid: true, value: labelSchema.validateSync(raw) };
    } catch (error) {
        return {
            valid: false,
            reason: failedTestOf(error) === 'max' ? 'labelTooLong' : 'labelEmpty',
        };
    }
};

export const validateText = (raw: string): TValidationResult<string> => {
    try {
        return { valid: true, value: textSchema.validateSync(raw) };
    } catch (error) {
        failedTestOf(error);
        return { valid: false, reason: 'textRequired' };
    }
};

export const validateDelay = (raw: string): TValidationResult<number> =>
    validateInteger(raw, MIN_STEP_DELAY, MAX_STEP_DELAY, {
        notInteger: 'delayNotInteger',
        outOfRange: 'delayOutOfRange',
    });

export const validatePosition = (
    raw: string,
    max: number,
): TValidationResult<number> =>
    validateInteger(raw, 1, max, {
        notInteger: 'positionNotInteger',
        outOfRange: 'positionOutOfRange',
    });
