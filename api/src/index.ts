import { AppBuilder } from "./app-builder";

async function start() {
  try {
    const appBuilder = new AppBuilder();
    const app = await appBuilder.build();
    const appConfig = app.diContainer.resolve("appConfig");
    await app.listen({
      host: appConfig.HOST,
      port: appConfig.PORT,
    });
    app.log.info(`📝 Environment: ${appConfig.NODE_ENV}`);
    app.log.info(`🕒 Time zone: ${appConfig.TIME_ZONE}`);

    const shutdown = () => {
      app.log.info("👋 Gracefully shutting down...");
      app
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          app.log.error({ error }, "Error during shutdown");
          process.exit(1);
        });
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  } catch (error) {
    console.error("❌ Error starting server:", error);
    process.exit(1);
  }
}

void start();
