import {
    AuthenticationExpiredError,
    BusinessRejectedError,
    ErrorCodes,
    InfrastructureError,
    TransientError,
    ValidationError,
    isRetryable,
    toTaskError,
} from '../src/errors';
import { parseTaskError } from '../src/grpc-client';
import { taskStatusFromProto, taskStatusToProto } from '../src/grpc-loader';

describe('error taxonomy', () => {
    test('should classify each error type', () => {
        expect(new ValidationError('x')).toMatchObject({ errorClass: 'validation', retryable: false, code: ErrorCodes.MISSING_REQUIRED_FIELD });
        expect(new TransientError('x')).toMatchObject({ errorClass: 'transient', retryable: true, code: ErrorCodes.UPSTREAM_UNAVAILABLE });
        expect(new AuthenticationExpiredError('x')).toMatchObject({ errorClass: 'auth_expired', retryable: true, code: ErrorCodes.AUTH_REJECTED });
        expect(new BusinessRejectedError('x')).toMatchObject({ errorClass: 'business_rejected', retryable: false, code: ErrorCodes.UPSTREAM_REJECTED });
        expect(new InfrastructureError('x')).toMatchObject({ errorClass: 'infrastructure', retryable: false, code: ErrorCodes.STORE_UNAVAILABLE });
        expect(new TransientError('x').name).toBe('TransientError');
    });

    test('should retry unclassified errors', () => {
        expect(isRetryable(new Error('boom'))).toBe(true);
        expect(isRetryable(new BusinessRejectedError('no'))).toBe(false);
    });

    test('should convert errors into task error documents', () => {
        expect(toTaskError(new BusinessRejectedError('duplicado', { status: 409 }))).toEqual({
            code: ErrorCodes.UPSTREAM_REJECTED,
            class: 'business_rejected',
            message: 'duplicado',
            details: { status: 409 },
        });
        expect(toTaskError('plain string')).toEqual({ code: ErrorCodes.HANDLER_ERROR, class: 'transient', message: 'plain string' });
    });
});

describe('parseTaskError', () => {
    test('should accept a well-formed document', () => {
        expect(parseTaskError({ code: 'C', class: 'transient', message: 'm', details: { a: 1 } })).toEqual({
            code: 'C',
            class: 'transient',
            message: 'm',
            details: { a: 1 },
        });
    });

    test('should drop documents with an unknown class', () => {
        expect(parseTaskError({ code: 'C', class: 'fatal', message: 'm' })).toBeUndefined();
        expect(parseTaskError(undefined)).toBeUndefined();
    });
});

describe('task status on the wire', () => {
    test('should map statuses both ways', () => {
        expect(taskStatusToProto('in_progress')).toBe('IN_PROGRESS');
        expect(taskStatusFromProto('RETRYING')).toBe('retrying');
        expect(() => taskStatusFromProto('TASK_STATUS_UNSPECIFIED')).toThrow('Unknown task status on the wire: TASK_STATUS_UNSPECIFIED');
    });
});
