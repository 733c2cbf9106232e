class CfgAdguardDnsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

class HeadFileError extends CfgAdguardDnsError {}

class CommandSpawnError extends CfgAdguardDnsError {
  readonly command: string;
  readonly args: readonly string[];

  constructor(
    message: string,
    command: string,
    args: readonly string[],
    cause: unknown
  ) {
    super(message, { cause });
    this.command = command;
    this.args = args;
  }
}

export { CfgAdguardDnsError, HeadFileError, CommandSpawnError };
