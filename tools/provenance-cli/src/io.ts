export interface CliIO {
	out(line: string): void;
	err(line: string): void;
}

export const consoleIO: CliIO = {
	out: (line) => console.log(line),
	err: (line) => console.error(line),
};
