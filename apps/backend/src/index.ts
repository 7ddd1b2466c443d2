import "dotenv/config";
import { buildApp } from "./app.js";

const app = await buildApp();

const port = Number(process.env.PORT || 8080);

// Startup log to aid operational visibility
app.log.info(
  {
    env: process.env.NODE_ENV || "development",
    port,
    cors: process.env.CORS_ORIGIN || false,
  },
  "Starting research API server"
);

await app.listen({ host: "0.0.0.0", port });
