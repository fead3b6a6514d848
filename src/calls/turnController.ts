export type TurnId = string;

export type TurnState = { kind: 'idle' } | { kind: 'active'; turnId: TurnId };

export type TurnStartOutcome =
  | { kind: 'started'; turnId: TurnId }
  | { kind: 'superseded'; turnId: TurnId; cancelTurnId: TurnId }
  | { kind: 'repeat'; turnId: TurnId };

export type TurnEndOutcome =
  | { kind: 'ended'; turnId: TurnId }
  | { kind: 'stale'; turnId: TurnId; activeTurnId: TurnId | null };

/**
 * Tracks the model's current conversational turn for a single call.
 *
 * A turn starting while another is active is a barge-in: the outcome names the
 * superseded turn so the caller can cancel it before treating the new turn's
 * audio as current.
 */
export class TurnController {
  private state: TurnState = { kind: 'idle' };

  getState(): TurnState {
    return this.state;
  }

  get activeTurnId(): TurnId | null {
    return this.state.kind === 'active' ? this.state.turnId : null;
  }

  turnStarted(turnId: TurnId): TurnStartOutcome {
    const current = this.state;
    if (current.kind === 'active' && current.turnId === turnId) {
      return { kind: 'repeat', turnId };
    }

    this.state = { kind: 'active', turnId };
    if (current.kind === 'active') {
      return { kind: 'superseded', turnId, cancelTurnId: current.turnId };
    }
    return { kind: 'started', turnId };
  }

  turnEnded(turnId: TurnId): TurnEndOutcome {
    const current = this.state;
    if (current.kind !== 'active' || current.turnId !== turnId) {
      return { kind: 'stale', turnId, activeTurnId: this.activeTurnId };
    }

    this.state = { kind: 'idle' };
    return { kind: 'ended', turnId };
  }
}
