import express, { Express } from "express";
import dotenv from "dotenv";
import cors from "cors";
import { HoneypotAgent } from "./core/agent";
import { loadConfig } from "./core/config";
import { SessionStore } from "./core/sessionStore";
import { SessionArchive } from "./core/supabase";
import { FinalReporter } from "./core/callback";
import { createDefaultLlmClient } from "./core/providers";
import { createHoneypotRouter } from "./routes/honeypot";
import { safeLog } from "./utils/logging";

dotenv.config();

export function createApp(agent?: HoneypotAgent): Express {
  const app = express();
  const honeypot =
    agent ??
    new HoneypotAgent({
      config: loadConfig(),
      store: new SessionStore(),
      llmClient: createDefaultLlmClient(),
      archive: SessionArchive.fromEnv(),
      reporter: new FinalReporter(process.env.CALLBACK_URL || "")
    });

  app.use(cors());
  app.use(express.json({ type: "*/*", limit: "2mb" }));
  app.use("/api", createHoneypotRouter(honeypot));

  app.get("/health", (_req, res) => {
    return res.json({ ok: true });
  });

  return app;
}

if (require.main === module) {
  const port = Number(process.env.PORT || 3000);
  createApp().listen(port, () => {
    safeLog(`Honeypot API listening on port ${port}`);
  });
}
