import { loadDotEnv, parseEnv } from "./env";

import { buildApp } from "./app";
import { makeClassifierFromEnv } from "./classifier/advisory";
import { loadRiskConfig } from "./config/risk_config";
import { makeStoreFromEnv } from "./store";

loadDotEnv();

async function main(): Promise<void> {
  const env = parseEnv();
  const config = loadRiskConfig(env.RISK_CONFIG_PROFILE, env.SAFEWAVE_REPO_ROOT);
  const store = await makeStoreFromEnv(env);

  const { app } = buildApp({
    store,
    classifier: makeClassifierFromEnv(env),
    config,
    storeTimeoutMs: env.STORE_TIMEOUT_MS,
    casMaxAttempts: env.CAS_MAX_ATTEMPTS,
  });
  app.log.info({ profile: config.profile, config_hash: config.config_hash, store: store.kind }, "risk engine ready");

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error(err);
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
