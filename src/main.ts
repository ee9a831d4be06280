#!/usr/bin/env node
import { Temporal } from "temporal-polyfill";
import { type ArrivalsConfig, loadConfig } from "./config";
import { summaryState, trainState } from "./display";
import { ArrivalPoller } from "./util/transit/ArrivalPoller";
import {
	type ScheduleCatalog,
	loadScheduleCatalog,
	resolveDisplayNames,
	stopsMissingFromLine,
} from "./util/transit/catalog";
import { errorMessage } from "./util/transit/errors";
import { validateCredentials } from "./util/transit/index";
import { MAX_TRAINS } from "./util/transit/rank";

async function loadCatalog(
	config: ArrivalsConfig,
): Promise<ScheduleCatalog | undefined> {
	if (!config.scheduleZip) return undefined;

	const catalog = await loadScheduleCatalog(config.scheduleZip);
	const missing = stopsMissingFromLine(config, catalog);
	if (missing.length > 0) {
		console.error("Configured stops are not served by the line", {
			lineId: config.lineId,
			missing,
		});
	}
	return catalog;
}

export async function main(): Promise<void> {
	const config = loadConfig();

	if (!(await validateCredentials(config))) {
		throw new Error("Feed credentials were rejected");
	}

	const names = resolveDisplayNames(config, await loadCatalog(config));
	const poller = new ArrivalPoller({ config, names });

	poller.subscribe((_snapshot, source) => {
		const today = Temporal.Now.plainDateISO(config.timeZone);
		console.log(`${names.lineName}: ${summaryState(source)}`);
		for (let slot = 1; slot <= MAX_TRAINS; slot++) {
			console.log(`  Train ${slot}: ${trainState(source, slot, today)}`);
		}
	});

	const shutdown = () => {
		poller.stop();
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	console.log("Polling trip updates", {
		lineId: config.lineId,
		from: config.startStation,
		to: config.endStation,
		intervalSeconds: config.pollIntervalSeconds,
	});
	await poller.start();
}

if (require.main === module) {
	main().catch((error: unknown) => {
		console.error(`Startup failed: ${errorMessage(error)}`);
		process.exitCode = 1;
	});
}
