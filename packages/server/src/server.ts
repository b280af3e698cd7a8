import { loadPlannerConfig } from "@placegrid/engine";
import { createApp } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);
const CONFIG_PATH = process.env["PLACEGRID_CONFIG"];

const config = CONFIG_PATH ? loadPlannerConfig(CONFIG_PATH) : loadPlannerConfig();
const app = createApp(config);

app.listen(PORT, () => {
  console.log(`\n[server] placegrid API running at http://localhost:${PORT}`);
  console.log(`[server] ${Object.keys(config.referencePoints).length} reference points configured\n`);
});
