import { ConfigManager } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { AdventureOrchestrator } from '../engine/AdventureOrchestrator.js';
import { AdventureSession, describePhase } from '../engine/AdventureSession.js';
import { TurnEngine } from '../engine/TurnEngine.js';

const registryLog = createLogger(NAMESPACES.services.registry);

export interface SessionSummary {
  id: string;
  title?: string;
  players: string[];
  scenes: number;
  phase: string;
}

export interface CreateSessionOptions {
  id?: string;
}

/**
 * Live adventures held in memory, keyed by session id. Nothing here survives
 * a restart.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, AdventureOrchestrator>();

  constructor(
    private readonly engine: TurnEngine,
    private readonly configManager: ConfigManager
  ) {}

  create(options: CreateSessionOptions = {}): AdventureOrchestrator {
    if (options.id !== undefined && this.sessions.has(options.id)) {
      throw new Error(`Session ${options.id} already exists`);
    }
    const session = new AdventureSession({
      maxPlayers: this.configManager.getFeatures().maxPlayers,
      id: options.id
    });
    const orchestrator = new AdventureOrchestrator(this.engine, this.configManager, session);
    this.sessions.set(orchestrator.id, orchestrator);
    registryLog('[REGISTRY] created session %s (%d live)', orchestrator.id, this.sessions.size);
    return orchestrator;
  }

  get(id: string): AdventureOrchestrator | undefined {
    return this.sessions.get(id);
  }

  /** Oldest first. */
  list(): SessionSummary[] {
    return [...this.sessions.values()]
      .sort((a, b) => a.session.createdAt.getTime() - b.session.createdAt.getTime())
      .map(({ session }) => ({
        id: session.id,
        ...(session.story.isInitialized && { title: session.story.title }),
        players: session.party.map(c => c.name),
        scenes: session.sceneHistory.length,
        phase: describePhase(session.phase)
      }));
  }

  remove(id: string): boolean {
    const orchestrator = this.sessions.get(id);
    if (!orchestrator) return false;
    orchestrator.abandon();
    this.sessions.delete(id);
    registryLog('[REGISTRY] removed session %s', id);
    return true;
  }

  get size(): number {
    return this.sessions.size;
  }
}

