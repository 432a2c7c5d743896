import { AgentOrchestrator } from './orchestrator';

export type OrchestratorFactory = (sessionId: string) => AgentOrchestrator;

/**
 * One orchestrator per session, created on first use. Orchestrators keep no
 * locks, so sessions never share one.
 */
export class SessionRegistry {
    private readonly sessions = new Map<string, AgentOrchestrator>();

    constructor(private readonly factory: OrchestratorFactory = () => new AgentOrchestrator()) {}

    get(sessionId: string): AgentOrchestrator {
        let orchestrator = this.sessions.get(sessionId);
        if (!orchestrator) {
            orchestrator = this.factory(sessionId);
            this.sessions.set(sessionId, orchestrator);
            console.info(`[SessionRegistry] Started session ${sessionId}`);
        }
        return orchestrator;
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    get size(): number {
        return this.sessions.size;
    }

    /** Resets and forgets the session's orchestrator. Returns false if there was none. */
    end(sessionId: string): boolean {
        const orchestrator = this.sessions.get(sessionId);
        if (!orchestrator) return false;
        orchestrator.reset();
        this.sessions.delete(sessionId);
        console.info(`[SessionRegistry] Ended session ${sessionId}`);
        return true;
    }

    endAll(): void {
        for (const sessionId of [...this.sessions.keys()]) {
            this.end(sessionId);
        }
    }
}
