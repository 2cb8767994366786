#!/usr/bin/env node
import "dotenv/config";
import { loadAppConfig } from "./core/config/app-config";
import { sanitizeUrl } from "./core/validation/url";
import {
  checkUrls,
  createExtractor,
  createFetcher,
  createTracker,
} from "./core/services/tracker";
import { toError } from "./core/utils/errors";
import { Logger } from "./core/utils/logger";

const HELP = `Usage:
price-watch --once [--urls <url1,url2>]
price-watch --check [--urls <url1,url2>]

CLI Mode - run a single pass instead of the long-running watcher

Options:
  --once     Run one cycle (fetch, notify, persist), then exit
  --check    Fetch and extract only; nothing is sent or stored
             (TELEGRAM_TOKEN and TELEGRAM_CHAT_ID are not required)
  --urls     Override the configured product URLs (comma-separated)
  --help     Show this message

Examples:
  npm run cli -- --once
  npm run cli -- --check --urls https://produto.mercadolivre.com.br/MLB-123

Note: for continuous monitoring, use: npm start (uses dist/index.js)`;

async function main() {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (hasFlag("--help") || (!hasFlag("--once") && !hasFlag("--check"))) {
    Logger.info(HELP);
    process.exit(hasFlag("--help") ? 0 : 1);
  }

  // --check sends nothing, so the Telegram keys are optional there
  const config = loadAppConfig(process.env, {
    requireTelegram: !hasFlag("--check"),
  });

  let urls = config.productUrls;
  const urlsArg = getArg("--urls");
  if (urlsArg) {
    urls = [];
    for (const raw of urlsArg.split(",").map((s) => s.trim()).filter(Boolean)) {
      const url = sanitizeUrl(raw);
      if (!url) {
        Logger.error(`❌ Invalid URL: ${raw}`);
        process.exit(1);
      }
      urls.push(url);
    }
  }

  if (hasFlag("--check")) {
    const results = await checkUrls(
      urls,
      createFetcher(config),
      createExtractor(config),
    );
    for (const { url, result } of results) {
      if (result.ok) {
        Logger.info(`✅ ${result.observation.productName}`, {
          url,
          ...result.observation,
        });
      } else {
        Logger.warn(`❌ ${result.reason}: ${result.detail}`, { url });
      }
    }
    const okCount = results.filter((r) => r.result.ok).length;
    Logger.info(`Check completed: ${okCount}/${results.length} extracted`);
    return;
  }

  const loop = createTracker(config, { urls });
  await loop.run({ maxCycles: 1 });
}

main()
  .then(() => process.exit(0))
  .catch((e) => {
    Logger.error("❌ Run failed", toError(e));
    process.exit(1);
  });
