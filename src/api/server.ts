import express from "express";
import routes from "./routes";

/**
 * Errors raised by Express middleware (e.g. body-parser) carry an HTTP status.
 */
interface HttpError extends Error {
  status?: number;
  type?: string;
}

const app = express();
const PORT = process.env.PORT || 3000;

// Middleware
app.use(express.json());

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
app.use("/api", routes);

// Error handling middleware: client errors (malformed JSON, oversized body) are 400
app.use((err: HttpError, req: express.Request, res: express.Response, next: express.NextFunction) => {
  if (err.status !== undefined && err.status < 500) {
    const issue = err.type === "entity.parse.failed" ? "body: malformed JSON" : `body: ${err.message}`;
    res.status(400).json({
      error: "Invalid input",
      issues: [issue],
    });
    return;
  }
  console.error("Unhandled error:", err);
  res.status(500).json({
    error: "Internal server error",
    message: err.message,
  });
});

// Start server
if (require.main === module) {
  app.listen(PORT, () => {
    console.log(`Server running on port ${PORT}`);
    console.log(`API available at http://localhost:${PORT}/api`);
  });
}

export default app;
