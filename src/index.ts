import { loadConfig, loadEnvFile } from "./config.js";
import { ConfigError } from "./errors.js";
import { checkBackends, createBackends, runPipelines } from "./runPipeLines.js";

async function main() {
  loadEnvFile();
  const config = loadConfig();

  // --check: 백엔드 연결만 확인하고 종료
  if (process.argv.includes("--check")) {
    const { recognizer, translator } = createBackends(config);
    const ok = await checkBackends(recognizer, translator);
    process.exitCode = ok ? 0 : 1;
    return;
  }

  const { stop } = await runPipelines(config);

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`${signal} received, shutting down`);
    stop()
      .catch((err) => {
        console.error("shutdown error", err);
        process.exitCode = 1;
      })
      .finally(() => process.exit());
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error("startup failed", err);
  }
  process.exit(1);
});
