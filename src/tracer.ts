import otel, { Span, SpanStatusCode } from '@opentelemetry/api';
import { logger } from './log';
import { getVersion } from './version';

export const PackageName = 'hot-content-update';
export const ot = { trace: otel.trace, context: otel.context };

/**
 * Spans are created through the global OpenTelemetry API,
 * they are only exported when the host process registers a tracer provider.
 */
class TraceControl {
  tracer = ot.trace.getTracer(PackageName, getVersion().version ?? 'unknown');
  rootSpan?: Span;

  /** Start a root span that traces a whole command */
  startRootSpan<T>(name: string, cb: (s: Span) => Promise<T>): Promise<T> {
    if (this.rootSpan) throw new Error('Duplicate root span');
    logger.info({ command: { package: PackageName, name, ...getVersion() } }, 'Command:Start');

    return this.tracer.startActiveSpan(name, async (span) => {
      this.rootSpan = span;
      try {
        return await cb(span);
      } finally {
        span.end();
      }
    });
  }

  /** Run `cb` inside a child span of the active span, recording any failure */
  span<T>(name: string, cb: (s: Span) => Promise<T>): Promise<T> {
    return this.tracer.startActiveSpan(name, async (span) => {
      try {
        return await cb(span);
      } catch (e) {
        span.recordException(e instanceof Error ? e : String(e));
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw e;
      } finally {
        span.end();
      }
    });
  }

  async run(cb: () => Promise<unknown>): Promise<void> {
    try {
      await cb();
    } catch (e) {
      if (this.rootSpan) this.rootSpan.recordException(e instanceof Error ? e : String(e));
      logger.fatal({ err: e }, 'Command:Failed');
      process.exitCode = 1;
    }
  }
}

export const Tracer = new TraceControl();
