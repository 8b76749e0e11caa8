// config/languages.ts
import { z } from 'zod';
import languageTable from './languages.json';

const languagesSchema = z.array(
    z.object({
        code: z.string().min(2),
        name: z.string().min(1),
    })
);

export type Language = z.infer<typeof languagesSchema>[number];

export const languages: Language[] = languagesSchema.parse(languageTable);

const byCode = new Map(languages.map((language) => [language.code, language]));

export const isSupportedLanguage = (code: string): boolean => byCode.has(code);

export const languageName = (code: string): string => byCode.get(code)?.name ?? code;
