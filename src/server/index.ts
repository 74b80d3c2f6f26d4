import "dotenv/config";
import { loadConfig } from "../config/index.js";
import { buildServer } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const server = buildServer({ config });

  try {
    await server.listen({ port: config.port, host: config.host });
    console.log(`🛡️  Misinformation Toolkit running on http://${config.host}:${config.port}`);
    console.log(`   Mode:   ${config.gateway.mode}`);
    console.log(`   Health: http://localhost:${config.port}/health`);
    console.log(`   POST /analyze with { "text": "..." }`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`❌ Startup failed: ${message}`);
  process.exit(1);
});
