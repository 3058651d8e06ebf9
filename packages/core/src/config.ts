import fs from "node:fs";
import path from "node:path";
import { loadEnvFiles } from "./env";

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	try {
		const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf8"));
		return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
	} catch {
		return false;
	}
};

/**
 * Nearest ancestor of `from` (default: cwd) holding `.git` or a package.json
 * that declares workspaces. Falls back to the filesystem root.
 */
export const findWorkspaceRoot = (from: string = process.cwd()): string => {
	let current = path.resolve(from);
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			return current;
		}
		current = parent;
	}
	return current;
};

export const getWorkspaceRoot = (): string => {
	if (!cachedWorkspaceRoot) {
		cachedWorkspaceRoot = findWorkspaceRoot();
	}
	return cachedWorkspaceRoot;
};

/**
 * Resolves an indicator-set file: explicit path, then `INDICORE_INDICATOR_SET`,
 * relative paths against `root`. The env files under `root` are loaded before
 * the variable is read.
 */
export const resolveIndicatorSetPath = (
	explicitPath?: string,
	root: string = getWorkspaceRoot()
): string => {
	if (!explicitPath) {
		loadEnvFiles(root);
	}
	const candidate = explicitPath ?? process.env.INDICORE_INDICATOR_SET;
	if (!candidate) {
		throw new Error(
			"No indicator set file given. Pass a path or set INDICORE_INDICATOR_SET."
		);
	}
	return path.isAbsolute(candidate) ? candidate : path.join(root, candidate);
};
