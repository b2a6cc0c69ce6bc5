const STRIPPED_PREFIXES = ['eeg ', 'eeg_', 'eeg-'];

const LEGACY_ALIASES: Record<string, string> = {
    t3: 't7',
    t4: 't8',
    t5: 'p7',
    t6: 'p8',
};

/**
 * Lookup key for an electrode label: "EEG Fp1-REF" -> "fp1", "T3" -> "t7".
 * Returns '' for blank input.
 */
export function normalizeChannelName(name: string): string {
    let label = name.trim();
    if (!label) {
        return '';
    }
    const lower = label.toLowerCase();
    const prefix = STRIPPED_PREFIXES.find((candidate) => lower.startsWith(candidate));
    if (prefix) {
        label = label.slice(prefix.length);
    }
    if (label.toLowerCase().endsWith('-ref')) {
        label = label.slice(0, -4);
    }
    const key = label.replace(/[ _]/g, '').toLowerCase();
    return LEGACY_ALIASES[key] ?? key;
}
