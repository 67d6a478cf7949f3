/**
 * Port path helpers
 *
 * A port path is the list of hub port numbers from the bus root to a device.
 * Textual form follows the Linux device naming: "1-2.3" is bus 1, port 2 of the
 * root hub, then port 3 of that hub. The root hub itself is "1-0".
 */

export type PortPath = readonly number[];

export function formatPortPath(bus: number, path: PortPath): string {
    return path.length === 0 ? `${bus}-0` : `${bus}-${path.join('.')}`;
}

/**
 * Interface path, e.g. "1-1.3:1.0" for configuration 1 interface 0
 */
export function formatInterfacePath(bus: number, path: PortPath, configuration: number, interfaceNumber: number): string {
    return `${formatPortPath(bus, path)}:${configuration}.${interfaceNumber}`;
}

/**
 * Parse "1-2.3", "1-0" or "usb1". Interface suffixes (":1.0") are ignored.
 */
export function parsePortPath(text: string): { bus: number; path: number[] } | undefined {
    const rootMatch = /^usb(\d+)$/.exec(text);
    if (rootMatch) {
        return { bus: parseInt(rootMatch[1], 10), path: [] };
    }

    const match = /^(\d+)-(\d+(?:\.\d+)*)(?::\d+\.\d+)?$/.exec(text);
    if (!match) {
        return undefined;
    }
    const bus = parseInt(match[1], 10);
    if (match[2] === '0') {
        return { bus, path: [] };
    }
    const path = match[2].split('.').map((part) => parseInt(part, 10));
    if (path.some((port) => port <= 0)) {
        return undefined;
    }
    return { bus, path };
}

/**
 * Immediate parent hub's path; undefined for the root hub
 */
export function parentPortPath(path: PortPath): number[] | undefined {
    return path.length === 0 ? undefined : path.slice(0, -1);
}

/**
 * Port on the root hub the branch hangs from
 */
export function trunkPort(path: PortPath): number | undefined {
    return path.length > 0 ? path[0] : undefined;
}

/**
 * Total order: shallower paths first, then element-wise
 */
export function comparePortPaths(a: PortPath, b: PortPath): number {
    if (a.length !== b.length) {
        return a.length - b.length;
    }
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) {
            return a[i] - b[i];
        }
    }
    return 0;
}

/**
 * Depth-first order (a parent directly followed by its subtree), used for listings
 */
export function comparePortPathsDepthFirst(a: PortPath, b: PortPath): number {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
        if (a[i] !== b[i]) {
            return a[i] - b[i];
        }
    }
    return a.length - b.length;
}

export function portPathsEqual(a: PortPath, b: PortPath): boolean {
    return a.length === b.length && a.every((port, i) => port === b[i]);
}

export function isPortPathPrefix(prefix: PortPath, path: PortPath): boolean {
    return prefix.length <= path.length && prefix.every((port, i) => port === path[i]);
}
