import fs from "node:fs/promises";
import path from "node:path";

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Parsed file content, or `fallback` when the file does not exist yet. */
export async function readJson(
	filePath: string,
	fallback: unknown,
): Promise<unknown> {
	try {
		const content = await fs.readFile(filePath, "utf8");
		return JSON.parse(content);
	} catch (err: unknown) {
		if (isMissingFile(err)) return fallback;
		throw err;
	}
}

export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
}

/** Appends one JSON document per line, creating the parent directory first. */
export async function appendJsonLine(
	filePath: string,
	record: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

export async function readJsonLines(filePath: string): Promise<unknown[]> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err: unknown) {
		if (isMissingFile(err)) return [];
		throw err;
	}
	return content
		.split("\n")
		.filter((line) => line.trim() !== "")
		.map((line) => JSON.parse(line));
}
