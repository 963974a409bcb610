export type ArgValue = string | boolean;

export interface ParsedArgs {
	flags: Record<string, ArgValue>;
	positionals: string[];
}

export const parseCliArgs = (argv: string[]): ParsedArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (token === undefined) {
			continue;
		}
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			flags[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	return { flags, positionals };
};

export const readString = (
	flags: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = flags[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`--${key} expects a value`);
	}
	return value;
};

export const readNumber = (
	flags: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = readString(flags, key);
	if (raw === undefined) {
		return undefined;
	}
	const num = Number(raw);
	if (!Number.isFinite(num)) {
		throw new Error(`Invalid numeric value for --${key}: ${raw}`);
	}
	return num;
};

export const readFlag = (
	flags: Record<string, ArgValue>,
	key: string
): boolean => flags[key] === true || flags[key] === "true";
