import * as opentelemetry from "@opentelemetry/api"

const TRACER_NAME = "wasm-web-build"

/**
 * Tracer gives each build step its own span.
 */
export class Tracer {
  private tracer: opentelemetry.Tracer

  constructor(name: string) {
    this.tracer = opentelemetry.trace.getTracer(name)
  }

  /**
   * Run one build step, such as "cargo build" or "wasm-opt", as the active
   * span. A step that fails leaves its error and an ERROR status on the span
   * before the failure reaches the pipeline.
   *
   * @example
   * ```
   * const wasmOpt = await getTracer().startActiveSpan(
   *   "provision wasm-opt",
   *   () => getWasmOpt(config),
   *   { "build.crate": config.crate },
   * )
   * ```
   */
  public async startActiveSpan<T>(
    step: string,
    run: (span: opentelemetry.Span) => Promise<T>,
    attributes?: opentelemetry.Attributes,
  ): Promise<T> {
    return this.tracer.startActiveSpan(step, { attributes }, async (span) => {
      try {
        return await run(span)
      } catch (e) {
        if (e instanceof Error) {
          span.recordException(e)
          span.setStatus({
            code: opentelemetry.SpanStatusCode.ERROR,
            message: e.message,
          })
        }

        throw e
      } finally {
        span.end()
      }
    })
  }
}

/**
 * Return a tracer for the build steps. Spans are no-ops unless the host
 * process registered a tracer provider.
 */
export function getTracer(name = TRACER_NAME): Tracer {
  return new Tracer(name)
}
