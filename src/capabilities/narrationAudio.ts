// capabilities/narrationAudio.ts
import type { Capability, UnitSuccess, WorkUnit } from '../lib/jobs/capability';
import type { BlobStore } from '../types/collaborators';
import type { JsonObject } from '../types/job';
import type { SpeechModel } from '../types/llm';
import type { NarrationAudioTask, Task } from '../types/queue';
import { slideLabel } from './slideFormat';

export interface NarrationUnit extends WorkUnit {
    script: string;
}

export interface NarrationAudio {
    url: string;
    ref: string;
}

export class NarrationAudioCapability
    implements Capability<'narration-audio', NarrationUnit, NarrationAudio>
{
    readonly queue = 'narration-audio' as const;
    readonly unitNoun = 'slide' as const;

    constructor(
        private readonly speech: SpeechModel,
        private readonly blobStore: BlobStore
    ) {}

    parse(task: Task): NarrationAudioTask | null {
        return task.queue === 'narration-audio' ? task : null;
    }

    async open(task: NarrationAudioTask): Promise<NarrationUnit[]> {
        return task.payload.slides
            .filter((slide) => slide.script.trim().length > 0)
            .map((slide) => ({
                index: slide.index,
                label: slideLabel(slide.index),
                script: slide.script.trim(),
            }));
    }

    async runUnit(unit: NarrationUnit, task: NarrationAudioTask): Promise<NarrationAudio> {
        const { presentationId, language, voice } = task.payload;
        const speech = await this.speech.synthesize(unit.script, { ...voice, language });

        const stored = await this.blobStore.store(speech.audio, {
            folder: `narration/${presentationId}`,
            extension: speech.extension,
            contentType: speech.contentType,
        });

        return { url: stored.url, ref: stored.ref };
    }

    async buildResult(
        successes: UnitSuccess<NarrationUnit, NarrationAudio>[],
        task: NarrationAudioTask
    ): Promise<JsonObject> {
        return {
            presentation_id: task.payload.presentationId,
            language: task.payload.language,
            voice_name: task.payload.voice.name,
            audio_files: successes.map(({ unit, value }) => ({
                slide_index: unit.index,
                audio_url: value.url,
            })),
        };
    }
}
