import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Resolve CLI version from local package.json at runtime.
 * Works for source and built dist paths.
 */
export function getCliVersion(fallback = '0.0.0'): string {
    try {
        const modulePath = fileURLToPath(import.meta.url);
        let dir = path.dirname(modulePath);
        // Two levels up from src/utils/; a build nests it under dist/packages/
        for (let depth = 0; depth < 6; depth++) {
            const candidates = [
                path.join(dir, 'package.json'),
                path.join(dir, 'packages', 'restage-cli', 'package.json'),
            ];
            for (const pkgPath of candidates) {
                if (!fs.existsSync(pkgPath)) {
                    continue;
                }
                const pkg = JSON.parse(fs.readFileSync(pkgPath, 'utf-8')) as { name?: string; version?: string };
                if (pkg.name === '@restage/cli' && pkg.version && pkg.version.trim().length > 0) {
                    return pkg.version;
                }
            }
            dir = path.dirname(dir);
        }
    } catch {
        // Fall through to fallback.
    }
    return fallback;
}
