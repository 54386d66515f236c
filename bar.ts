// bar.ts

import chalk from "chalk";
import cliProgress from "cli-progress";

/** One tick per scanned record, with the running added count beside it */
class ScanBar {
	private bar: cliProgress.SingleBar;

	constructor(total: number, options: BarOptions = {}) {
		const color = options.color ?? chalk.green;

		this.bar = new cliProgress.SingleBar(
			{
				format:
					`${chalk.cyan.bold("{task}")} ${color("{bar}")} {value}/{total} ` +
					`${chalk.dim("added {added}")} ${chalk.gray("{detail}")}`,
				barsize: 30,
				hideCursor: true,
			},
			cliProgress.Presets.rect,
		);
		this.bar.start(total, 0, { task: options.task ?? "", added: 0, detail: "" });
	}

	tick(detail: string, added: number) {
		this.bar.increment(1, { detail, added });
	}

	stop(summary?: string) {
		this.bar.stop();
		if (summary) console.log(chalk.green.bold(`✅ ${summary}`));
	}
}

export default {
	start(total: number, options?: BarOptions) {
		return new ScanBar(total, options);
	},
};
