/**
 * watch command - Apply config changes whenever a config file changes
 */

import chalk from "chalk";
import { ConfigWatcher, type FileChangeBatch } from "../../core/watcher/config-watcher.js";
import { createProjectConfig, resolveSettings } from "../../core/project-config/index.js";
import { createLogger } from "../../utils/logger.js";
import { loadSettings, type GlobalOptions } from "../settings.js";
import { formatEventKind } from "./format.js";

const logger = createLogger("watch");

export interface WatchOptions extends GlobalOptions {
  debounce?: number;
  poll?: boolean;
}

export async function watchCommand(options: WatchOptions): Promise<void> {
  const input = await loadSettings(options);
  const settings = resolveSettings(input);

  if (!settings.useConfigFile) {
    console.log(chalk.yellow("Config files are disabled; nothing to watch."));
    return;
  }

  // A fresh instance per batch so every run reads the files from disk
  const applyBatch = async (batch: FileChangeBatch): Promise<void> => {
    const config = createProjectConfig(input);
    const result = await config.applyPendingChanges({ force: true });
    await config.flush();

    console.log(
      chalk.dim(`[${new Date(batch.timestamp).toLocaleTimeString()}]`),
      `${batch.filesChanged.length + batch.filesRemoved.length} file(s) changed,`,
      `${result.report.fired.length} change(s) applied`
    );
    for (const { kind, path } of result.report.fired) {
      console.log(`  ${formatEventKind(kind)} ${path}`);
    }
  };

  const watcher = new ConfigWatcher({
    configDir: settings.configDir,
    debounceMs: options.debounce,
    usePolling: options.poll,
    onBatch: applyBatch,
    onError: (error) => {
      logger.error({ err: error }, "Failed to apply config changes");
      console.error(chalk.red(`Error: ${error.message}`));
    },
  });

  await watcher.start();
  console.log(chalk.cyan(`Watching ${settings.configDir} for changes (Ctrl+C to stop)`));

  await new Promise<void>((resolve) => {
    const stop = (): void => {
      watcher.stop().then(resolve, (error: unknown) => {
        logger.error({ err: error }, "Failed to stop watcher");
        resolve();
      });
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });
}
