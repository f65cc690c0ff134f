export type ScanbookErrorCode = "PRECONDITION" | "EXTERNAL_TOOL" | "INPUT_DISCOVERY";

export class ScanbookError extends Error {
  readonly code: ScanbookErrorCode;

  constructor(code: ScanbookErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Source image does not satisfy what the crop and resize math assumes. */
export class PreconditionError extends ScanbookError {
  constructor(message: string) {
    super("PRECONDITION", message);
  }
}

export class InputDiscoveryError extends ScanbookError {
  constructor(message: string) {
    super("INPUT_DISCOVERY", message);
  }
}

export type ExternalToolFailure = {
  command: string;
  args: string[];
  exitCode: number | null;
  stdout: string;
  stderr: string;
  reason?: string;
};

export class ExternalToolError extends ScanbookError {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(failure: ExternalToolFailure) {
    super("EXTERNAL_TOOL", describeFailure(failure));
    this.command = failure.command;
    this.args = failure.args;
    this.exitCode = failure.exitCode;
    this.stdout = failure.stdout;
    this.stderr = failure.stderr;
  }
}

function describeFailure(failure: ExternalToolFailure): string {
  const head = failure.reason
    ? `${failure.command} ${failure.reason}`
    : `${failure.command} failed with exit code ${failure.exitCode}`;
  const parts = [`${head}.`];
  if (failure.stdout.trim()) parts.push(`STDOUT:\n${failure.stdout.slice(0, 1000)}`);
  if (failure.stderr.trim()) parts.push(`STDERR:\n${failure.stderr.slice(0, 1000)}`);
  return parts.join("\n");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
