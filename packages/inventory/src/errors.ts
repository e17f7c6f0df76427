export class InvalidResponseError extends Error {
  constructor(message: string) {
    super(`Invalid service response: ${message}`);
    this.name = "InvalidResponseError";
  }
}

export class ParameterNameError extends Error {
  readonly parameterName: string;

  constructor(parameterName: string, reason: string) {
    super(`Invalid parameter name "${parameterName}": ${reason}`);
    this.name = "ParameterNameError";
    this.parameterName = parameterName;
  }
}

export class EnvFileFormatError extends Error {
  readonly lineNumber: number;
  readonly line: string;

  constructor(lineNumber: number, line: string) {
    super(
      `Badly formatted env file: expected '=' on line ${lineNumber}: ${JSON.stringify(line)}`
    );
    this.name = "EnvFileFormatError";
    this.lineNumber = lineNumber;
    this.line = line;
  }
}
