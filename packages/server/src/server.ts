import { createApp } from "./app.js";
import { RoutePlanningService } from "./services/route-planning.service.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);
const PROFILE = process.env["PLANNER_PROFILE"] || undefined;

const service = RoutePlanningService.fromConfig(PROFILE);
const app = createApp(service);

app.listen(PORT, () => {
  console.log(`\n[server] Road trip planner API running at http://localhost:${PORT}`);
  console.log(`[server] Profile: ${PROFILE ?? "default"}, network: ${JSON.stringify(service.summary())}\n`);
});
