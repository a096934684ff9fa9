import "dotenv/config";
import { serve } from "@hono/node-server";
import { getConfig } from "./reframer/config/loadConfig.js";
import { createApp } from "./reframer/http/createApp.js";

const config = getConfig();
const app = createApp(config);

if (config.secretKey === "dev") {
  console.warn("[reframe-server] SECRET_KEY is not set; using the development default");
}

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log("[reframe-server] started", { port: info.port, provider: config.llm.provider });
});
