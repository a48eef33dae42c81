import path from "node:path";
import { getAnomalies, isAnalysisFailure } from "./analysis/engine";
import { createElectricityAnalyzer } from "./analysis/resources";
import { generateElectricityData } from "./data/generator";
import { env } from "./env";
import { recommendFromElectricity } from "./insights/recommender";
import { loadCsv, saveInsight } from "./io/csv";
import { logger } from "./logger";
import { PolicyRetriever } from "./policies/retriever";
import { formatSustainabilityReport } from "./report/sustainability-report";

// usage: npm run example [file.csv]   (relative paths resolve under DATA_DIR)
async function run() {
  const file = process.argv[2];
  const rows = file
    ? await loadCsv(path.resolve(env.DATA_DIR, file))
    : generateElectricityData({ days: 14 });

  const analyzer = createElectricityAnalyzer({
    anomalyPercentile: env.ELECTRICITY_THRESHOLD_PERCENTILE,
    nightHours: env.NIGHT_TIME_HOURS,
  });
  const result = analyzer.analyze(rows);
  if (isAnalysisFailure(result)) {
    logger.warn(result, "nothing to analyze");
    return;
  }

  for (const [facility, f] of Object.entries(result.facility_analysis)) {
    console.log(
      formatSustainabilityReport({
        facility,
        resource: "electricity",
        anomalies: f.anomalies,
        threshold: result.anomaly_threshold,
        trend: result.consumption_trend,
      })
    );
  }
  console.log(JSON.stringify(result, null, 2));
  console.log(
    "top anomalies:",
    getAnomalies(result)
      .slice(0, 5)
      .map((a) => `${a.facility}:${a.value}`)
  );

  if (!env.GEMINI_API_KEY) {
    logger.info("GEMINI_API_KEY not set, skipping insights");
    return;
  }
  const policies = await PolicyRetriever.fromFile();
  const text = await recommendFromElectricity({ result, policies });
  console.log(text);
  await saveInsight(text, env.INSIGHTS_FILE);
}

run().catch((err) => {
  logger.error({ err }, "example failed");
  process.exitCode = 1;
});
