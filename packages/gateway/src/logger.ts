export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export class Logger {
  public constructor(
    private readonly verbose: boolean,
    private readonly cookieName = "gateway_session",
  ) {}

  public info(message: string): void {
    this.print("INFO", message);
  }

  public warn(message: string): void {
    this.print("WARN", message);
  }

  public error(message: string): void {
    this.print("ERROR", message);
  }

  public debug(message: string): void {
    if (!this.verbose) {
      return;
    }
    this.print("DEBUG", message);
  }

  private print(level: LogLevel, message: string): void {
    const ts = new Date().toISOString();
    const output = `[${ts}] [${level}] ${this.redact(message)}`;

    if (level === "ERROR") {
      console.error(output);
      return;
    }

    console.log(output);
  }

  /**
   * Redacts secret-bearing patterns from log messages:
   * - Authorization values (`Basic ...`, `Bearer ...`)
   * - URL query tokens (`?token=...`)
   * - the session cookie (`<cookieName>=...`)
   * - JSON credential fields (`"password"`, `"password_hash"`, `"salt"`, `"token"`)
   */
  private redact(message: string): string {
    const cookiePattern = new RegExp(`(${escapeRegExp(this.cookieName)}=)[^;\\s]+`, "g");

    return String(message)
      .replace(/((?:Basic|Bearer)\s+)[A-Za-z0-9._~+/=-]+/gi, "$1***REDACTED***")
      .replace(/([?&]token=)[^&\s]+/gi, "$1***REDACTED***")
      .replace(cookiePattern, "$1***REDACTED***")
      .replace(/("(?:password|password_hash|salt|token)"\s*:\s*")[^"]*(")/gi, "$1***REDACTED***$2");
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
