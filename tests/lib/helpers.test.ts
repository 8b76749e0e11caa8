import { describe, expect, it } from 'vitest';
import Helpers from '../../src/lib/helpers';

describe('Helpers', () => {
    it('verifies a token it signed', () => {
        const token = Helpers.generateJWTToken({ sub: 'user-a', email: 'a@example.test' });

        expect(Helpers.verifyJWTToken(token)).toEqual({ sub: 'user-a', email: 'a@example.test' });
    });

    it('rejects a malformed token', () => {
        expect(Helpers.verifyJWTToken('not-a-token')).toBeNull();
    });

    it('rejects an expired token', () => {
        const token = Helpers.generateJWTToken({ sub: 'user-a' }, -10);

        expect(Helpers.verifyJWTToken(token)).toBeNull();
    });

    it('describes unknown errors', () => {
        expect(Helpers.errorMessage(new Error('boom'))).toBe('boom');
        expect(Helpers.errorMessage('plain')).toBe('plain');
        expect(Helpers.errorMessage(42)).toBe('Unknown error');
    });
});
