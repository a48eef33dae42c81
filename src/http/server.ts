import { env } from "../env";
import { logger } from "../logger";
import { PolicyRetriever } from "../policies/retriever";
import { createApp } from "./app";

const policies = await PolicyRetriever.fromFile();
const app = createApp({ policies });

app.listen(env.PORT, () => logger.info({ port: env.PORT }, "http listening"));
