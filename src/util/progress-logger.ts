import chalk from 'chalk';
import termSize from 'term-size';

const { stdout, platform } = process;

export class ProgressLogger {
	private counter = 0;
	private total = 0;
	private columns = 0;
	private readonly onResize = () => this.resize();

	constructor() {
		this.resize();

		stdout.on('resize', this.onResize);
	}

	static get isSupported() {
		return stdout.isTTY;
	}

	start(total: number, item: string) {
		this.counter = 0;
		this.total = total;

		stdout.write(chalk.cyan('-'));
		stdout.cursorTo(2);
		stdout.write(`[  0.00%] ${item.slice(0, Math.max(0, this.columns - 13))}\n`);
	}

	tick() {
		this.counter++;
		stdout.moveCursor(0, -1);
		stdout.cursorTo(3);
		stdout.write(((this.counter / this.total) * 100).toFixed(2).padStart(6));
		stdout.cursorTo(0);

		if (this.counter < this.total) {
			stdout.moveCursor(0, 1);
			return;
		}

		stdout.write(chalk.green('✓'));
		stdout.moveCursor(-1, 1);
		stdout.off('resize', this.onResize);
	}

	private resize() {
		let { columns } = termSize();
		if (platform === 'win32') columns--;
		this.columns = columns;
	}
}
