/* eslint-disable no-console */
import type { DrawClass, RenderLayer } from './types.js';

export type TelemetrySeverity = 'error' | 'warning' | 'info';

/**
 * Payload of every event the renderer reports, keyed by event name.
 */
export interface RendererEventMap {
  readonly InvalidObject: {
    readonly layer: RenderLayer;
    readonly drawClass: DrawClass;
    readonly message: string;
  };
  readonly BufferOverflow: {
    readonly layer: RenderLayer;
    readonly drawClass: DrawClass;
    readonly capacity: number;
  };
  readonly AtlasMissing: {
    readonly layer: RenderLayer;
    readonly drawClass: DrawClass;
    readonly dropped: number;
  };
  readonly InstanceBufferGrown: {
    readonly layer: RenderLayer;
    readonly drawClass: DrawClass;
    readonly capacity: number;
    readonly bytes: number;
  };
  readonly DeviceDispatchFailure: {
    readonly frame: number;
    readonly drawClass: DrawClass | undefined;
    readonly message: string;
  };
  readonly DeviceLost: { readonly reason: string; readonly message: string };
  readonly DeviceLostCallbackFailed: { readonly message: string };
  readonly DeviceLostWatchFailed: { readonly message: string };
}

export type RendererEventName = keyof RendererEventMap;

export const EVENT_SEVERITY: { readonly [E in RendererEventName]: TelemetrySeverity } =
  Object.freeze({
    InvalidObject: 'warning',
    BufferOverflow: 'error',
    AtlasMissing: 'warning',
    InstanceBufferGrown: 'info',
    DeviceDispatchFailure: 'error',
    DeviceLost: 'error',
    DeviceLostCallbackFailed: 'error',
    DeviceLostWatchFailed: 'error',
  });

export interface RendererEvent<E extends RendererEventName = RendererEventName> {
  readonly name: E;
  readonly severity: TelemetrySeverity;
  readonly data: RendererEventMap[E];
}

/**
 * Totals for one frame, across both layers.
 */
export interface FrameTelemetry {
  readonly frame: number;
  readonly submitted: boolean;
  readonly queued: number;
  readonly drawnClasses: number;
  readonly dispatches: number;
  readonly draws: number;
  readonly immediateVertices: number;
}

export interface TelemetrySink {
  event(event: RendererEvent): void;
  frame(summary: FrameTelemetry): void;
}

export const silentTelemetry: TelemetrySink = {
  event() {},
  frame() {},
};

/**
 * Logs events at the console level matching their severity, and frame
 * totals at debug.
 */
export function createConsoleTelemetry(prefix = 'lumen2d'): TelemetrySink {
  return {
    event({ name, severity, data }) {
      const line = `[${prefix}] ${name}`;
      switch (severity) {
        case 'error':
          console.error(line, data);
          return;
        case 'warning':
          console.warn(line, data);
          return;
        case 'info':
          console.info(line, data);
          return;
      }
    },
    frame(summary) {
      console.debug(`[${prefix}] frame ${summary.frame}`, summary);
    },
  };
}

export interface RecordingTelemetry extends TelemetrySink {
  readonly events: RendererEvent[];
  readonly frames: FrameTelemetry[];
  /**
   * Payloads of the recorded events called `name`, oldest first.
   */
  payloads<E extends RendererEventName>(name: E): RendererEventMap[E][];
}

/**
 * Keeps everything it receives in memory.
 */
export function createRecordingTelemetry(): RecordingTelemetry {
  const events: RendererEvent[] = [];
  const frames: FrameTelemetry[] = [];

  return {
    events,
    frames,
    event(event) {
      events.push(event);
    },
    frame(summary) {
      frames.push(summary);
    },
    payloads<E extends RendererEventName>(name: E) {
      return events
        .filter((event): event is RendererEvent<E> => event.name === name)
        .map((event) => event.data);
    },
  };
}

let activeSink: TelemetrySink = silentTelemetry;

function deliver(send: (sink: TelemetrySink) => void): void {
  try {
    send(activeSink);
  } catch (error) {
    console.error('[lumen2d] telemetry sink failed', error);
  }
}

/**
 * Entry point used by the renderer. A throwing sink never reaches the caller.
 */
export const telemetry = {
  emit<E extends RendererEventName>(name: E, data: RendererEventMap[E]): void {
    const event: RendererEvent<E> = { name, severity: EVENT_SEVERITY[name], data };
    deliver((sink) => sink.event(event));
  },
  frame(summary: FrameTelemetry): void {
    deliver((sink) => sink.frame(summary));
  },
};

export function setTelemetry(sink: TelemetrySink): void {
  activeSink = sink;
}

export function resetTelemetry(): void {
  activeSink = silentTelemetry;
}
