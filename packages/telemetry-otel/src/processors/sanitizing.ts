import type { Context } from '@opentelemetry/api';
import type { ReadableSpan, Span, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { sanitize } from '@fnhost/privacy';
import { SANITIZED_SPAN_ATTRIBUTES } from '@fnhost/telemetry';

/**
 * Redacts credentials from URL attributes when a span ends.
 *
 * Must be the first span processor so exporters only see sanitized values.
 */
export class SpanSanitizingProcessor implements SpanProcessor {
  static readonly instance = new SpanSanitizingProcessor();

  private constructor() {}

  onStart(_span: Span, _parentContext: Context): void {}

  onEnd(span: ReadableSpan): void {
    for (const key of SANITIZED_SPAN_ATTRIBUTES) {
      const value = span.attributes[key];
      if (typeof value === 'string') {
        span.attributes[key] = sanitize(value);
      }
    }
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }
}
