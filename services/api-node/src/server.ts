import { env } from "./config/env.js";
import { createApp } from "./app.js";

const app = createApp();

app.listen(env.API_PORT, () => {
  // eslint-disable-next-line no-console
  console.log(
    `Rosca circles API listening on port ${env.API_PORT} (token ${env.TOKEN_LIVE_MODE ? "live" : "simulation"})`
  );
});
