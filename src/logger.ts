const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";

export interface Logger {
	info(message: string): void;
	success(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	/** A step in a process, printed indented */
	step(message: string): void;
	/** A path written or read */
	file(path: string): void;
}

/**
 * Console logging with consistent prefixes.
 */
export const consoleLogger: Logger = {
	info(message: string): void {
		console.log(`${CYAN}info${RESET}  ${message}`);
	},

	success(message: string): void {
		console.log(`${GREEN}done${RESET}  ${message}`);
	},

	warn(message: string): void {
		console.log(`${YELLOW}warn${RESET}  ${message}`);
	},

	error(message: string): void {
		console.error(`${RED}error${RESET} ${message}`);
	},

	step(message: string): void {
		console.log(`${DIM}  >${RESET} ${message}`);
	},

	file(path: string): void {
		console.log(`${DIM}     ${path}${RESET}`);
	},
};

export const silentLogger: Logger = {
	info: () => { },
	success: () => { },
	warn: () => { },
	error: () => { },
	step: () => { },
	file: () => { },
};
