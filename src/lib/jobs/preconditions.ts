// lib/jobs/preconditions.ts
import { isSupportedLanguage } from '../../config/languages';
import { APIError } from '../APIError';

export function requireSupportedLanguage(code: string): void {
    if (!isSupportedLanguage(code)) {
        throw new APIError({
            code: 400,
            errorCode: 'UNSUPPORTED_LANGUAGE',
            message: `Unsupported language: ${code}`,
        });
    }
}
