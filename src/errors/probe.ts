import { formatErrorMessageWithContext } from "./base";

export type ProbeFailureKind = "timeout" | "network" | "status";

export interface ProbeErrorContext {
  endpointName: string;
  url?: string | URL;
  httpStatus?: number;
}

export interface ProbeNetworkErrorOptions {
  cause?: unknown;
}

/**
 * Describes why a probe was classified DOWN. It is attached to the probe
 * result and logged, never thrown out of the prober.
 */
export class ProbeNetworkError extends Error {
  readonly kind: ProbeFailureKind;
  readonly endpointName: string;
  readonly url?: string;
  readonly httpStatus?: number;

  constructor(
    kind: ProbeFailureKind,
    message: string,
    context: ProbeErrorContext,
    options: ProbeNetworkErrorOptions = {},
  ) {
    const url = context.url instanceof URL ? context.url.toString() : context.url;
    super(
      formatErrorMessageWithContext(message, { endpointName: context.endpointName, url }),
      options.cause === undefined ? undefined : { cause: options.cause },
    );

    this.name = "ProbeNetworkError";
    this.kind = kind;
    this.endpointName = context.endpointName;
    this.url = url;
    this.httpStatus = context.httpStatus;
  }
}
