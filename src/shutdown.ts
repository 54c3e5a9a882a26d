/**
 * Setup graceful shutdown handlers.
 * Stops the bot on SIGINT/SIGTERM, forcing an exit if that hangs.
 */
export function setupGracefulShutdown(
  stop: () => Promise<void>,
  options: { timeout?: number } = {}
): void {
  const { timeout = 30_000 } = options;
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log(`[digt-bot] ${signal} received`);

    const timer = setTimeout(() => {
      console.error("[digt-bot] Shutdown timed out, exiting");
      process.exit(1);
    }, timeout);
    timer.unref();

    try {
      await stop();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`[digt-bot] Shutdown error: ${msg}`);
      process.exit(1);
    }

    process.exit(0);
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}
