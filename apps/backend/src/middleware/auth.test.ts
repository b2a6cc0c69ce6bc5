import { extractBearerToken, validateSharedToken } from './auth';

describe('extractBearerToken', () => {
    it('reads bearer credentials', () => {
        expect(extractBearerToken('Bearer test-secret')).toBe('test-secret');
        expect(extractBearerToken('  bearer   test-secret ')).toBe('test-secret');
    });

    it('ignores missing or non-bearer headers', () => {
        expect(extractBearerToken(undefined)).toBeNull();
        expect(extractBearerToken('   ')).toBeNull();
        expect(extractBearerToken('Bearer ')).toBeNull();
        expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    });
});

describe('validateSharedToken', () => {
    it('accepts only the exact token', () => {
        expect(validateSharedToken('test-secret', 'test-secret')).toBe(true);
        expect(validateSharedToken('test-secreT', 'test-secret')).toBe(false);
        expect(validateSharedToken('test', 'test-secret')).toBe(false);
        expect(validateSharedToken(null, 'test-secret')).toBe(false);
        expect(validateSharedToken('test-secret', '')).toBe(false);
    });
});
