#!/usr/bin/env node
import { DEFAULT_CONFIG_PATH, loadMarkerConfig, saveMarkerConfig } from "../config";
import { TemporalMarkerError } from "../errors";
import { rolloutBucket, shouldIncludeMarkers } from "../rollout";

const USAGE = `Usage: node dist/cli/rollout.js <command> [--config <path>]

Commands:
  status              Show current rollout (default)
  enable              Enable markers and restart the rollout at 0%
  disable             Disable markers completely
  set <percentage>    Set rollout percentage (0-100)
  check <video_id>    Show the video's bucket and whether it is included`;

export function main(argv: string[]): number {
  const configFlag = argv.indexOf("--config");
  const configPath = configFlag >= 0 ? argv[configFlag + 1] : DEFAULT_CONFIG_PATH;
  if (configFlag >= 0 && !configPath) {
    console.error(USAGE);
    return 1;
  }
  const rest = configFlag >= 0 ? argv.filter((_, i) => i !== configFlag && i !== configFlag + 1) : argv;
  const [command = "status", arg] = rest;
  const config = loadMarkerConfig(configPath);

  switch (command) {
    case "status":
      console.log(`Enabled: ${config.enabled ? "yes" : "no"}`);
      console.log(`Rollout: ${config.percentage}%`);
      console.log(`Config: ${configPath}`);
      return 0;
    case "enable":
      saveMarkerConfig(configPath, { ...config, enabled: true, percentage: 0 });
      console.log("Temporal markers enabled (0% rollout)");
      return 0;
    case "disable":
      saveMarkerConfig(configPath, { ...config, enabled: false });
      console.log("Temporal markers disabled");
      return 0;
    case "set": {
      const percentage = Number(arg);
      if (arg === undefined || !Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
        console.error("Percentage must be a number between 0 and 100");
        return 1;
      }
      saveMarkerConfig(configPath, { ...config, enabled: config.enabled || percentage > 0, percentage });
      console.log(`Rollout updated: ${config.percentage}% -> ${percentage}%`);
      return 0;
    }
    case "check":
      if (!arg) {
        console.error(USAGE);
        return 1;
      }
      console.log(`Bucket: ${rolloutBucket(arg)}`);
      console.log(`Included: ${shouldIncludeMarkers(arg, config) ? "yes" : "no"}`);
      return 0;
    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

export function run(argv: string[]): number {
  try {
    return main(argv);
  } catch (err) {
    if (!(err instanceof TemporalMarkerError)) throw err;
    console.error(err.message);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
