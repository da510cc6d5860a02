import { StompFrame } from './model';

export type StompValidator = (frame: StompFrame) => StompValidationResult;

export interface StompValidationResult {
    isValid: boolean;
    message?: string;
    details?: string;
}

const validationOk: StompValidationResult = { isValid: true };

function isPresent(value: string | undefined) {
    return typeof value !== 'undefined';
}

function missingHeader(frame: StompFrame, headerName: string): StompValidationResult {
    return {
        isValid: false,
        message: `Header '${headerName}' is required for ${frame.command}`,
        details: 'Frame: ' + frame.toString()
    };
}

export function requireHeader(headerName: string): StompValidator {
    return (frame: StompFrame) => {
        if (isPresent(frame.headers[headerName])) {
            return validationOk;
        }
        return missingHeader(frame, headerName);
    };
}

export function requireAllHeaders(...headerNames: string[]): StompValidator {
    return (frame: StompFrame) => {
        for (const headerName of headerNames) {
            if (!isPresent(frame.headers[headerName])) {
                return missingHeader(frame, headerName);
            }
        }
        return validationOk;
    };
}

export function validateFrame(frame: StompFrame, validators: StompValidator[]): StompValidationResult {
    for (const validator of validators) {
        const validation = validator(frame);
        if (!validation.isValid) {
            return validation;
        }
    }
    return validationOk;
}
