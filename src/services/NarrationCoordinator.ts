import { ConfigManager } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { GenerationGateway } from '../gateway/GenerationGateway.js';
import { VisualAgent } from '../agents/VisualAgent.js';
import type { EnrichmentMedia, Scene } from '../types/Scene.js';
import type { StoryState } from './StoryState.js';

const narrationLog = createLogger(NAMESPACES.services.narration);

export type MediaOutcome = 'attached' | 'failed' | 'skipped';

export interface EnrichmentOutcome {
  sceneId: number;
  narration: MediaOutcome;
  image: MediaOutcome;
}

export interface EnrichOptions {
  /** Checked before anything is written; a false return discards results. */
  isActive?: () => boolean;
}

/**
 * Best-effort speech and imagery for a scene. The two calls run concurrently
 * and never affect each other or the scene text; this method never rejects.
 */
export class NarrationCoordinator {
  constructor(
    private readonly gateway: GenerationGateway,
    private readonly visualAgent: VisualAgent,
    private readonly configManager: ConfigManager
  ) {}

  async enrich(scene: Scene, story: StoryState, options: EnrichOptions = {}): Promise<EnrichmentOutcome> {
    const features = this.configManager.getFeatures();
    const isActive = options.isActive ?? (() => true);

    const [narration, image] = await Promise.all([
      features.narrationEnabled ? this.narrate(scene, isActive) : Promise.resolve<MediaOutcome>('skipped'),
      features.imageryEnabled ? this.illustrate(scene, story, isActive) : Promise.resolve<MediaOutcome>('skipped')
    ]);

    scene.enrichment = 'complete';
    narrationLog('[ENRICH] scene=%d narration=%s image=%s', scene.id, narration, image);
    return { sceneId: scene.id, narration, image };
  }

  private async narrate(scene: Scene, isActive: () => boolean): Promise<MediaOutcome> {
    try {
      const result = await this.gateway.generateSpeech(scene.text);
      if (!result.ok) {
        return this.degrade(scene, isActive, 'narration', `${result.error.kind}: ${result.error.detail}`);
      }
      if (!isActive()) return 'skipped';
      scene.narrationAudio ??= result.value;
      return 'attached';
    } catch (error) {
      return this.degrade(scene, isActive, 'narration', error instanceof Error ? error.message : String(error));
    }
  }

  private async illustrate(scene: Scene, story: StoryState, isActive: () => boolean): Promise<MediaOutcome> {
    try {
      const description = scene.imageDescription
        ?? await this.visualAgent.run({ sceneText: scene.text, setting: story.setting });
      const result = await this.gateway.generateImage(description);
      if (!result.ok) {
        return this.degrade(scene, isActive, 'image', `${result.error.kind}: ${result.error.detail}`);
      }
      if (!isActive()) return 'skipped';
      scene.image ??= result.value;
      return 'attached';
    } catch (error) {
      // Includes a failed image-description call from the visual agent
      return this.degrade(scene, isActive, 'image', error instanceof Error ? error.message : String(error));
    }
  }

  private degrade(scene: Scene, isActive: () => boolean, media: EnrichmentMedia, detail: string): MediaOutcome {
    narrationLog('[ENRICH] scene=%d %s failed: %s', scene.id, media, detail);
    if (!isActive()) return 'skipped';
    if (!scene.degraded.includes(media)) {
      scene.degraded.push(media);
    }
    return 'failed';
  }
}
