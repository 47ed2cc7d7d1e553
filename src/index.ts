import { runCli } from "./cli/run";

runCli().catch((error) => {
  console.error("Failed to start chord dictionary server", error);
  process.exit(1);
});
