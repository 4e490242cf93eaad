import type {AccessTokenRecord} from '@token-gate/db';
import type {StructuredLogger} from '@token-gate/logging';

import type {AccessDenialReason} from './validator';

export type AccessGrantedEvent<TRequest> = {
  request: TRequest;
  token: AccessTokenRecord;
  protectedPath: string;
};

export type AccessDeniedEvent<TRequest> = {
  request: TRequest;
  path: string;
  reason: AccessDenialReason;
};

export type AccessEventSink<TRequest> = {
  accessGranted?: (event: AccessGrantedEvent<TRequest>) => void;
  accessDenied?: (event: AccessDeniedEvent<TRequest>) => void;
};

export type AccessEventEmitter<TRequest> = {
  emitGranted: (event: AccessGrantedEvent<TRequest>) => void;
  emitDenied: (event: AccessDeniedEvent<TRequest>) => void;
};

/**
 * Fans events out to every sink in registration order. A sink that throws is
 * logged and skipped; it never changes the access decision.
 */
export const createAccessEventEmitter = <TRequest>({
  sinks = [],
  logger
}: {
  sinks?: ReadonlyArray<AccessEventSink<TRequest>>;
  logger?: StructuredLogger;
}): AccessEventEmitter<TRequest> => {
  const dispatch = <TEvent>({
    eventName,
    event,
    pick
  }: {
    eventName: 'access_granted' | 'access_denied';
    event: TEvent;
    pick: (sink: AccessEventSink<TRequest>) => ((event: TEvent) => void) | undefined;
  }) => {
    for (const sink of sinks) {
      const listener = pick(sink);
      if (!listener) {
        continue;
      }

      try {
        listener(event);
      } catch (error) {
        logger?.error({
          event: 'access.event_sink.failed',
          component: 'access_gate.events',
          message: `Access event sink failed for ${eventName}`,
          reason_code: 'event_sink_error',
          metadata: {event_name: eventName, error}
        });
      }
    }
  };

  return {
    emitGranted: event => dispatch({eventName: 'access_granted', event, pick: sink => sink.accessGranted}),
    emitDenied: event => dispatch({eventName: 'access_denied', event, pick: sink => sink.accessDenied})
  };
};
