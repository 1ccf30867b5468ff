import dotenv from "dotenv";
import { createApp } from "./app";
import { config } from "./config";
import { getDatabase } from "./database";
import { createSqliteChartStore } from "./services/chartPayloads";

dotenv.config();

const store = createSqliteChartStore(getDatabase());
const app = createApp(store);
const port = config.port;

app.listen(port, () => {
  console.log(`Chartwright backend listening on port ${port}`);
});
