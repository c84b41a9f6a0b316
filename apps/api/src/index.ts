import { createServer } from "./server.js";
import { loadConfig } from "./config/env.js";
import { log } from "./logger.js";

const config = loadConfig();
const app = createServer({ config });

app.listen(config.port, () => {
  log({
    level: "info",
    msg: "api_listening",
    url: `http://localhost:${config.port}`,
    preset: config.preset
  });
});
