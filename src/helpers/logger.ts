import { Config } from "../config";
import { HostEndpointsError } from "../errors/host-endpoints.error";

const LEVELS = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogLevel = keyof typeof LEVELS;

function isLogLevel(level: string): level is LogLevel {
  return level in LEVELS;
}

/**
 * Console logger prefixing every line with time, level and component
 */
export class Logger {

  constructor(private readonly id: string) {
  }

  public isEnabled(level: LogLevel): boolean {
    let configured = Config.logging.level.toLowerCase();
    let threshold = isLogLevel(configured) ? LEVELS[configured] : LEVELS.info;
    return LEVELS[level] >= threshold;
  }

  public debug(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("debug")) {
      console.info(this.prefix("DEBUG"), message, ...optionalParams);
    }
  }

  public info(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("info")) {
      console.info(this.prefix("INFO"), message, ...optionalParams);
    }
  }

  public warn(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("warn")) {
      console.error(this.prefix("WARN"), ...[message, ...optionalParams].map(friendly));
    }
  }

  public error(message: unknown, ...optionalParams: unknown[]): void {
    if (this.isEnabled("error")) {
      console.error(this.prefix("ERROR"), ...[message, ...optionalParams].map(friendly));
    }
  }

  private prefix(level: string): string {
    return `[${new Date().toISOString()}] [${level}] [${this.id}]`;
  }

}

// HostEndpointsError prints as "<kind>: <message>", without a stack
function friendly(param: unknown): unknown {
  if (param instanceof HostEndpointsError) {
    return param.toString();
  }
  return param;
}
