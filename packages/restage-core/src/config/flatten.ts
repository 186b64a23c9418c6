/**
 * Flatten a line-oriented `key="value"` formatter config into the single
 * option string a formatter takes after its config flag.
 *
 * Every line break becomes a comma, one trailing comma is dropped, and all
 * double quotes are removed: `key1="v1"\nkey2="v2"\n` → `key1=v1,key2=v2`.
 */
export function flattenFormatterConfig(raw: string): string {
    return raw
        .replace(/\n/g, ',')
        .replace(/,$/, '')
        .replace(/"/g, '');
}
