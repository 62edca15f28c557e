import express from "express";
import routes, { API_ENDPOINTS } from "./routes";
import { DEFAULT_PORT } from "../utils/constants";

const app = express();
const PORT = process.env.PORT || DEFAULT_PORT;

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
app.use("/api", routes);

// Root endpoint
app.get("/", (req, res) => {
  res.json({
    message: "Receivables Automation ROI API",
    version: "1.0.0",
    endpoints: API_ENDPOINTS,
  });
});

// Error handling middleware
type HttpError = Error & { status?: number; statusCode?: number };

app.use((err: HttpError, req: express.Request, res: express.Response, next: express.NextFunction) => {
  // Malformed JSON bodies surface here from express.json()
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Malformed JSON body", message: err.message });
    return;
  }
  // Client errors raised by express and body-parser (bad URL encoding, oversized body)
  const status = err.status ?? err.statusCode;
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({ error: err.message });
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
