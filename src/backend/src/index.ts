import { loadConfig } from "./config";
import { startServer } from "./server";

startServer(loadConfig()).catch(e => {
  console.error(e);
  process.exit(1);
});
