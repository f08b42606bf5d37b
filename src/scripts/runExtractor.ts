import { config } from "../config/config";
import { createLogger } from "../utils/logger";
import { runExtraction } from "../services/extractorService";

const logger = createLogger();

async function main(): Promise<void> {
  const [inputDir = config.dataDir, outputDir = config.extractorOutputDir] =
    process.argv.slice(2);

  logger.info(`Input directory: ${inputDir}`);
  logger.info(`Output directory: ${outputDir}`);

  await runExtraction(inputDir, outputDir, logger);
}

main().catch((err) => {
  logger.error("Fatal error in extractor", err);
  process.exit(1);
});
