/**
 * Console logger for the miner.
 *
 * Status lines carry an emoji prefix; debug lines only print with --verbose.
 */

export class Logger {
  private verbose: boolean;
  private scope: string;

  constructor(verbose = false, scope = "miner") {
    this.verbose = verbose;
    this.scope = scope;
  }

  child(scope: string): Logger {
    return new Logger(this.verbose, `${this.scope}:${scope}`);
  }

  info(message: string): void {
    console.log(`[${this.scope}] ${message}`);
  }

  warn(message: string): void {
    console.log(`[${this.scope}] ⚠️  ${message}`);
  }

  error(message: string): void {
    console.error(`[${this.scope}] ❌ ${message}`);
  }

  success(message: string): void {
    console.log(`[${this.scope}] ✅ ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(`[${this.scope}:debug] ${message}`);
    }
  }

  banner(title: string): void {
    const width = 62;
    const pad = Math.max(0, width - title.length);
    const left = Math.floor(pad / 2);
    console.log("╔" + "═".repeat(width) + "╗");
    console.log("║" + " ".repeat(left) + title + " ".repeat(pad - left) + "║");
    console.log("╚" + "═".repeat(width) + "╝\n");
  }

  separator(): void {
    console.log("═".repeat(63));
  }
}

/** Logger that discards everything; handy as a default collaborator. */
export const silentLogger: Logger = new (class extends Logger {
  override info(): void {}
  override warn(): void {}
  override error(): void {}
  override success(): void {}
  override debug(): void {}
  override banner(): void {}
  override separator(): void {}
})();
