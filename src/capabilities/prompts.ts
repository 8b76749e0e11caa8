// capabilities/prompts.ts
import type { ChatMessage } from '../types/llm';
import { languageName } from '../config/languages';

export function translationMessages(
    text: string,
    from: string,
    to: string,
    format: 'html' | 'plain'
): ChatMessage[] {
    const keep =
        format === 'html'
            ? 'Keep every HTML tag and attribute unchanged; translate only the text nodes.'
            : 'Answer with the translated text only.';
    return [
        {
            role: 'system',
            content: `Translate from ${languageName(from)} to ${languageName(to)}. ${keep}`,
        },
        { role: 'user', content: text },
    ];
}

export function slideFormatMessages(
    html: string,
    mode: 'format' | 'edit',
    instruction: string | null
): ChatMessage[] {
    const task =
        mode === 'format'
            ? 'Improve the layout and typography of this slide. Keep its content.'
            : 'Edit this slide as instructed.';
    return [
        {
            role: 'system',
            content: [task, instruction, 'Answer with the slide HTML only.']
                .filter(Boolean)
                .join('\n'),
        },
        { role: 'user', content: html },
    ];
}

export function outlineMessages(request: {
    title: string;
    goal: string;
    slideType: string;
    language: string;
    minSlides: number;
    maxSlides: number;
    userQuery: string | null;
}): ChatMessage[] {
    return [
        {
            role: 'system',
            content:
                `Plan a ${request.slideType} presentation in ${languageName(request.language)} ` +
                `with ${request.minSlides} to ${request.maxSlides} slides. ` +
                'Answer with JSON: {"slides":[{"title":string,"points":string[]}]}',
        },
        {
            role: 'user',
            content: [request.title, request.goal, request.userQuery].filter(Boolean).join('\n'),
        },
    ];
}

export function slideRenderMessages(
    deckTitle: string,
    slide: { title: string; points: string[] },
    language: string
): ChatMessage[] {
    return [
        {
            role: 'system',
            content:
                `Write one presentation slide in ${languageName(language)} for "${deckTitle}". ` +
                'Answer with the slide HTML only.',
        },
        {
            role: 'user',
            content: [slide.title, ...slide.points.map((point) => `- ${point}`)].join('\n'),
        },
    ];
}

export function editorMessages(request: {
    operation: 'edit' | 'format' | 'bilingual';
    contentType: string;
    content: string;
    instruction: string | null;
    sourceLanguage: string | null;
    targetLanguage: string | null;
    bilingualStyle: 'slash_separated' | 'line_break' | null;
}): ChatMessage[] {
    let task: string;
    switch (request.operation) {
        case 'edit':
            task = `Edit this ${request.contentType} as instructed.`;
            break;
        case 'format':
            task = `Reformat this ${request.contentType} for readability. Keep its content.`;
            break;
        case 'bilingual': {
            const separator =
                request.bilingualStyle === 'line_break'
                    ? 'on the next line'
                    : 'after a " / " separator';
            task =
                `Add a ${languageName(request.targetLanguage ?? 'en')} translation ${separator} ` +
                `after each ${languageName(request.sourceLanguage ?? 'vi')} sentence.`;
            break;
        }
    }

    return [
        {
            role: 'system',
            content: [task, request.instruction, 'Answer with HTML only.']
                .filter(Boolean)
                .join('\n'),
        },
        { role: 'user', content: request.content },
    ];
}

/**
 * Models like to wrap answers in markdown fences
 */
export function stripCodeFence(text: string): string {
    const trimmed = text.trim();
    const fenced = /^```[a-zA-Z]*\n([\s\S]*?)\n?```$/.exec(trimmed);
    return fenced ? fenced[1].trim() : trimmed;
}
