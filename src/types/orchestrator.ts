export type EventDetail = Record<string, unknown>;

export type OrchestratorEvent = { type: string; detail?: EventDetail };

export type EventSink = (ev: OrchestratorEvent) => void;
