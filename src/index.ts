#!/usr/bin/env node

import { Command } from "commander";
import { loadRunConfig, ConfigError, type CliOverrides } from "./lib/config.js";
import { createConsoleLogger, createRecordingLogger } from "./lib/log.js";
import { createProcessExecutor } from "./lib/exec.js";
import { RunAbortError } from "./lib/errors.js";
import { exitCodeFor } from "./constants/run_codes.js";
import { CLI_NAME } from "./lib/branding.js";

interface BuildOptions extends CliOverrides {
  json?: boolean;
}

const program = new Command();

program
  .name(CLI_NAME)
  .description("Discover ROS packages, build them and package each one as a Debian archive")
  .version("0.3.0")
  .option("-c, --config <path>", "Path to rosdeb.config.json");

function globalConfigPath(): string | undefined {
  return program.opts<{ config?: string }>().config;
}

function addTargetOptions(command: Command): Command {
  return command
    .option("--ros-distro <distro>", "ROS distro (env ROS_DISTRO)")
    .option("--os-version <codename>", "Target OS release (env DEBIAN_DISTRO)")
    .option("--os-name <name>", "Target OS name passed to bloom (default ubuntu)")
    .option("--packages-dir <dir>", "Directory searched for package.xml (env PACKAGES_DIR)")
    .option("--whitelist <regex>", "Only build packages whose path matches (env PACKAGE_WHITELIST)")
    .option("--blacklist <regex>", "Skip packages whose path matches (env PACKAGE_BLACKLIST)")
    .option("--working-dir <dir>", "Staging and build directory (env WORKING_DIR)")
    .option("--output-dir <dir>", "Directory collecting .deb files (env OUTPUT_DIR)")
    .option("--workspace", "Build all packages together before packaging (env WORKSPACE_BUILD)")
    .option("--no-workspace", "Package each package on its own, without a workspace build");
}

/**
 * Reports a fatal error and sets the exit status. Unknown errors are printed
 * with their stack.
 */
function fail(error: unknown): void {
  const logger = createConsoleLogger();
  if (error instanceof ConfigError) {
    logger.error(`Configuration error: ${error.message} (${error.code})`);
  } else if (error instanceof RunAbortError) {
    logger.error(`${error.message} (${error.code})`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exitCode = 1;
}

addTargetOptions(
  program
    .command("build", { isDefault: true })
    .description("Build and package every selected ROS package")
).action(async (options: BuildOptions) => {
  try {
    const config = await loadRunConfig({ configPath: globalConfigPath(), cli: options });
    const { runBuild } = await import("./runner/run.js");
    const report = await runBuild(config, {
      executor: createProcessExecutor(),
      logger: createConsoleLogger(),
    });
    process.exitCode = exitCodeFor(report.code);
  } catch (error) {
    fail(error);
  }
});

addTargetOptions(
  program
    .command("discover")
    .description("List the packages a build would select, without building")
    .option("--json", "Output in JSON format")
).action(async (options: BuildOptions) => {
  try {
    const config = await loadRunConfig({ configPath: globalConfigPath(), cli: options });
    const { planBuildSet } = await import("./runner/run.js");
    if (options.json) {
      const recorder = createRecordingLogger();
      const buildSet = await planBuildSet(config, recorder);
      console.log(JSON.stringify({ search_dir: config.search_dir, units: buildSet, log: recorder.entries }, null, 2));
      return;
    }
    const buildSet = await planBuildSet(config, createConsoleLogger());
    console.log(`\n${buildSet.length} package(s) selected:`);
    for (const unit of buildSet) {
      console.log(`  ${unit.name}\t${unit.path}`);
    }
  } catch (error) {
    fail(error);
  }
});

addTargetOptions(
  program
    .command("doctor")
    .description("Check that the external build tools are available")
).action(async (options: BuildOptions) => {
  try {
    const config = await loadRunConfig({ configPath: globalConfigPath(), cli: options });
    const { checkTools } = await import("./lib/doctor.js");
    console.log(`${CLI_NAME} doctor - checking build tools for ${config.ros_distro}/${config.os_version}\n`);

    const checks = await checkTools(config, createProcessExecutor());
    for (const check of checks) {
      const tag = check.available ? "[OK]" : "[FAIL]";
      console.log(`${tag} ${check.tool} (${check.purpose})${check.details ? `: ${check.details}` : ""}`);
    }

    const missing = checks.filter((check) => !check.available);
    console.log("\n--- Summary ---");
    if (missing.length === 0) {
      console.log("All tools found.");
    } else {
      console.log(`Missing ${missing.length} tool(s): ${missing.map((check) => check.tool).join(", ")}`);
      process.exitCode = 1;
    }
  } catch (error) {
    fail(error);
  }
});

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
