import "dotenv/config";
import { loadConfig } from "./config.js";
import { main } from "./main.js";

main(loadConfig()).catch((err) => {
  console.error("Transfer demo failed:", err);
  process.exit(1);
});
