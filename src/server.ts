import { pino } from "pino";
import { startFanout } from "./app.ts";

const logger = pino();

const start = async () => {
  const server = await startFanout({ host: "0.0.0.0" });
  const stop = () => {
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Failed to stop cleanly");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
};

start().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
