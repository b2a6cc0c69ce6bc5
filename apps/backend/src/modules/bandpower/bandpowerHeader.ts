export interface BandpowerHeader {
    timeIdx: number;
    bands: string[];
    channels: string[];
    /** Band-major: the column for (band b, channel c) is colIndices[b * channels.length + c], -1 if absent. */
    colIndices: number[];
}

const TIME_COLUMN_NAMES = new Set(['t_end_sec', 't_end_s', 't_sec', 'time_sec', 'time_s', 'time', 't']);

/**
 * Discovers the `<band>_<channel>` layout of a bandpower timeseries header.
 * Returns null until at least one band/channel column is present.
 */
export function parseBandpowerHeader(header: string[]): BandpowerHeader | null {
    if (header.length < 3) {
        return null;
    }

    let timeIdx = 0;
    for (let i = 0; i < header.length; i += 1) {
        if (TIME_COLUMN_NAMES.has(header[i].trim().toLowerCase())) {
            timeIdx = i;
            break;
        }
    }

    const bands: string[] = [];
    const channelsByBand = new Map<string, string[]>();
    const columnByPair = new Map<string, number>();

    header.forEach((raw, index) => {
        if (index === timeIdx) return;
        const name = raw.trim();
        if (!name || name.toLowerCase().endsWith('_z')) return;
        const split = name.indexOf('_');
        if (split < 0) return;
        const band = name.slice(0, split).trim();
        const channel = name.slice(split + 1).trim();
        if (!band || !channel) return;

        let channels = channelsByBand.get(band);
        if (!channels) {
            channels = [];
            channelsByBand.set(band, channels);
            bands.push(band);
        }
        if (!channels.includes(channel)) {
            channels.push(channel);
        }
        // A repeated column replaces the earlier one.
        columnByPair.set(`${band}\u0000${channel}`, index);
    });

    if (bands.length === 0) {
        return null;
    }

    const channels = channelsByBand.get(bands[0]) ?? [];
    const colIndices: number[] = [];
    for (const band of bands) {
        for (const channel of channels) {
            colIndices.push(columnByPair.get(`${band}\u0000${channel}`) ?? -1);
        }
    }

    return { timeIdx, bands, channels, colIndices };
}
