import { costOf } from '../../config/pricing';
import { jobProducer } from '../../lib/jobs';
import { requireSupportedLanguage } from '../../lib/jobs/preconditions';
import type { JobProducer } from '../../lib/jobs/producer';
import { toSnapshot, type JobSnapshot } from '../../lib/jobs/snapshot';
import type { FormatSlidesInput, GenerateSlidesInput, NarrationInput } from './schema';

export class SlidesService {
    constructor(private readonly producer: JobProducer) {}

    async format(userId: string, input: FormatSlidesInput): Promise<JobSnapshot> {
        // Slides without an explicit index keep their position
        const slides = input.slides.map((slide, position) => ({
            index: slide.index ?? position,
            html: slide.html,
        }));

        const record = await this.producer.submit({
            userId,
            body: {
                queue: 'slide-format',
                payload: {
                    documentId: input.document_id,
                    formatType: input.format_type,
                    instruction: input.instruction,
                    slides,
                },
            },
            unitNoun: 'slide',
            unitsTotal: slides.length,
            cost: costOf.slideFormat(slides.length),
            params: {
                document_id: input.document_id,
                format_type: input.format_type,
            },
        });

        return toSnapshot(record);
    }

    /**
     * Charged on the requested maximum; the outline decides the real count
     */
    async generate(userId: string, input: GenerateSlidesInput): Promise<JobSnapshot> {
        requireSupportedLanguage(input.language);

        const record = await this.producer.submit({
            userId,
            body: {
                queue: 'slide-generation',
                payload: {
                    title: input.title,
                    goal: input.goal,
                    slideType: input.slide_type,
                    language: input.language,
                    minSlides: input.min_slides,
                    maxSlides: input.max_slides,
                    userQuery: input.user_query,
                },
            },
            unitNoun: 'slide',
            unitsTotal: input.max_slides,
            cost: costOf.slideGeneration(input.max_slides),
            params: {
                title: input.title,
                slide_type: input.slide_type,
                language: input.language,
            },
        });

        return toSnapshot(record);
    }

    async narrate(userId: string, input: NarrationInput): Promise<JobSnapshot> {
        requireSupportedLanguage(input.language);

        const slides = input.slides
            .map((slide) => ({ index: slide.index, script: slide.script.trim() }))
            .filter((slide) => slide.script.length > 0);

        const record = await this.producer.submit({
            userId,
            body: {
                queue: 'narration-audio',
                payload: {
                    presentationId: input.presentation_id,
                    language: input.language,
                    voice: {
                        name: input.voice.name,
                        speakingRate: input.voice.speaking_rate,
                    },
                    slides,
                },
            },
            unitNoun: 'slide',
            unitsTotal: slides.length,
            cost: costOf.narrationAudio(slides.length),
            params: {
                presentation_id: input.presentation_id,
                language: input.language,
                voice_name: input.voice.name,
            },
        });

        return toSnapshot(record);
    }
}

export const slidesService = new SlidesService(jobProducer);
