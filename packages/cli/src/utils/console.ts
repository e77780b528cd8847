/**
 * Console output helpers. Every CLI message goes through these so the
 * symbols stay consistent: ✓ done, ⚠️ warning, ℹ note, → progress, ✖ error.
 */

export function log(message: string): void {
    console.log(message);
}

export function section(title: string): void {
    console.log(`\n--- ${title} ---`);
}

/** Indented line under a section or list heading. */
export function detail(message: string): void {
    console.log(`  ${message}`);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}
