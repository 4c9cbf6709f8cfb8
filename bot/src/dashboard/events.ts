import { EventEmitter } from "events";
import type { ActionKind, CycleSummary, Resources, RunnerState } from "../types.js";

// ─── Event Types ────────────────────────────────────────────────────────────

export interface StateChangeEvent {
  type: "state_change";
  ts: number;
  session: string;
  from: RunnerState;
  to: RunnerState;
}

export interface ResourcesEvent {
  type: "resources";
  ts: number;
  session: string;
  resources: Resources;
  constellationIndex: number;
}

export interface DecisionEvent {
  type: "decision";
  ts: number;
  session: string;
  kind: ActionKind;
  action: string;
  reason: string;
}

export interface ActionResultEvent {
  type: "action_result";
  ts: number;
  session: string;
  action: string;
  ok: boolean;
  detail: string;
}

export interface CycleSummaryEvent {
  type: "cycle_summary";
  ts: number;
  session: string;
  summary: CycleSummary;
}

export interface SleepEvent {
  type: "sleep";
  ts: number;
  session: string;
  seconds: number;
  reason: string;
}

export type DashboardEvent =
  | StateChangeEvent
  | ResourcesEvent
  | DecisionEvent
  | ActionResultEvent
  | CycleSummaryEvent
  | SleepEvent;

/** Latest known status of one account, sent to clients on connect. */
export interface SessionStatus {
  session: string;
  state: RunnerState;
  resources: Resources | null;
  constellationIndex: number | null;
  lastAction: string | null;
  wakeAt: number | null;
}

// ─── Dashboard Event Emitter ────────────────────────────────────────────────

const MAX_BUFFER_SIZE = 200;

export class DashboardEvents extends EventEmitter {
  private buffer: DashboardEvent[] = [];
  private readonly statuses = new Map<string, SessionStatus>();

  constructor(private readonly clock: () => number = Date.now) {
    super();
  }

  getRecentEvents(): DashboardEvent[] {
    return [...this.buffer];
  }

  getSessions(): SessionStatus[] {
    return [...this.statuses.values()].sort((a, b) => a.session.localeCompare(b.session));
  }

  private status(session: string): SessionStatus {
    let status = this.statuses.get(session);
    if (!status) {
      status = { session, state: "idle", resources: null, constellationIndex: null, lastAction: null, wakeAt: null };
      this.statuses.set(session, status);
    }
    return status;
  }

  private pushEvent(event: DashboardEvent): void {
    this.buffer.push(event);
    if (this.buffer.length > MAX_BUFFER_SIZE) {
      this.buffer = this.buffer.slice(-MAX_BUFFER_SIZE);
    }
    this.emit("event", event);
  }

  // ── Typed emitters ──

  emitStateChange(session: string, from: RunnerState, to: RunnerState): void {
    const status = this.status(session);
    status.state = to;
    if (to !== "sleeping") status.wakeAt = null;
    this.pushEvent({ type: "state_change", ts: this.clock(), session, from, to });
  }

  emitResources(session: string, resources: Resources, constellationIndex: number): void {
    const status = this.status(session);
    status.resources = { ...resources };
    status.constellationIndex = constellationIndex;
    this.pushEvent({ type: "resources", ts: this.clock(), session, resources: { ...resources }, constellationIndex });
  }

  emitDecision(session: string, kind: ActionKind, action: string, reason: string): void {
    this.pushEvent({ type: "decision", ts: this.clock(), session, kind, action, reason });
  }

  emitActionResult(session: string, action: string, ok: boolean, detail: string): void {
    if (ok) this.status(session).lastAction = action;
    this.pushEvent({ type: "action_result", ts: this.clock(), session, action, ok, detail });
  }

  emitCycleSummary(summary: CycleSummary): void {
    this.pushEvent({ type: "cycle_summary", ts: this.clock(), session: summary.sessionName, summary });
  }

  emitSleep(session: string, seconds: number, reason: string): void {
    const ts = this.clock();
    this.status(session).wakeAt = ts + seconds * 1000;
    this.pushEvent({ type: "sleep", ts, session, seconds, reason });
  }
}

export const dashboard = new DashboardEvents();
