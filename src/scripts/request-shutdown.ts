import { loadConfig, statePaths } from '../config/index.js';
import { FileShutdownSignal } from '../services/scanner/shutdown.js';

async function main() {
  const config = loadConfig();
  const { shutdown } = statePaths(config.DATA_DIR);
  await new FileShutdownSignal(shutdown).request();
  console.log(`Shutdown requested. The watcher stops at its next sleep tick (${shutdown}).`);
}

main().catch((err) => {
  console.error('Could not request shutdown:', err);
  process.exit(1);
});
