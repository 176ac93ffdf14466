export interface Logger {
	info(message: string): void;
	/** Only printed in verbose mode */
	debug(message: string): void;
	warn(message: string): void;
}

export function createLogger(verbose: boolean): Logger {
	return {
		info: (message) => console.log(message),
		debug: (message) => {
			if (verbose) {
				console.log(message);
			}
		},
		warn: (message) => console.error(message),
	};
}

export const silentLogger: Logger = {
	info: () => { },
	debug: () => { },
	warn: () => { },
};
