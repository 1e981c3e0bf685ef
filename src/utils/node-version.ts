/**
 * Refuse to start on Node.js releases without a stable global fetch
 */

export const MIN_NODE_VERSION = 20;

export function isSupportedNode(version: string = process.versions.node): boolean {
    const major = parseInt(version.split('.')[0], 10);
    return Number.isFinite(major) && major >= MIN_NODE_VERSION;
}

export function checkNodeVersion(): void {
    const currentVersion = process.versions.node;
    if (isSupportedNode(currentVersion)) return;

    console.error(
        `research requires Node.js ${MIN_NODE_VERSION} or higher (current: ${currentVersion}).\n` +
        'Please upgrade Node.js: https://nodejs.org'
    );
    process.exit(1);
}
