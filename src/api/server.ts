import express from "express";
import { createRouter } from "./routes";
import { CarePlanner } from "../planner/carePlanner";
import { loadResolvedSchema } from "../schema/schemaResolver";
import { loadConfig } from "../utils/config";
import { SchemaError, errorMessage } from "../utils/errors";

export function createApp(planner: CarePlanner): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(planner));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Senior Care Cost Planner API",
      version: "1.0.0",
      endpoints: {
        plan: "POST /api/plan",
        schema: "GET /api/schema",
        runway: "POST /api/runway",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware; body-parser reports malformed JSON with a 400 status
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", message: err.message });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: errorMessage(err),
    });
  });

  return app;
}

// Start server
if (require.main === module) {
  try {
    const config = loadConfig();
    const schema = loadResolvedSchema(config.schemaPath, config.overlayPath ?? undefined);
    const app = createApp(new CarePlanner(schema));
    app.listen(config.port, () => {
      console.log(`Server running on port ${config.port}`);
      console.log(`Schema ${schema.version} loaded from ${config.schemaPath}`);
      console.log(`API available at http://localhost:${config.port}/api`);
    });
  } catch (err) {
    if (err instanceof SchemaError) {
      console.error("Schema configuration problem:", err.message);
    } else {
      console.error("Failed to start server:", errorMessage(err));
    }
    process.exit(1);
  }
}
