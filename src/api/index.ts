import "dotenv/config";
import { loadEnv } from "../config/env.js";
import { openDatabase } from "../storage/index.js";
import { createServices } from "../services/index.js";
import { createApp } from "./app.js";

const env = loadEnv();
const database = openDatabase(env.DATABASE_PATH);
const services = createServices(database.db);
const app = createApp(services, { logRequests: env.NODE_ENV !== "test" });

const server = app.listen(env.PORT, () => {
  console.log(`🌐 Expense API running on http://localhost:${env.PORT}`);
  console.log(`📦 Database: ${env.DATABASE_PATH}`);
});

function shutdown(signal: string): void {
  console.log(`\n${signal} received, shutting down...`);
  server.close(() => {
    database.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("Uncaught exception:", error);
});
