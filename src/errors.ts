/** Base class for every error pingsieve raises or returns */
export class PingSieveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Fatal: the input or the options make the whole stream unusable
 * (ping without -D, invalid option values, unknown time-format directives).
 */
export class ConfigurationError extends PingSieveError {}

/** Fatal at startup: input is an interactive terminal, not a pipe. */
export class TerminalInputError extends PingSieveError {
  constructor() {
    super('pingsieve reads from a pipe, not from a terminal. Usage: ping -D <host> | pingsieve');
  }
}
