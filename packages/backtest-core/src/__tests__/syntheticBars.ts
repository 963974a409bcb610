import type { Bar } from "@fillreplay/core";

export const BASE_TIMESTAMP = 1_600_000_000_000;

/**
 * Deterministic drifting series: closes alternate +0.2% / -0.15%, each bar
 * opens at the previous close and volume grows by 10 per bar.
 */
export const makeSyntheticBars = (count: number, startPrice = 100): Bar[] => {
	const bars: Bar[] = [];
	let price = startPrice;
	for (let i = 0; i < count; i += 1) {
		const open = price;
		const close = i % 2 === 0 ? open * 1.002 : open * 0.9985;
		bars.push({
			timestamp: BASE_TIMESTAMP + i * 60_000,
			open,
			high: Math.max(open, close) * 1.001,
			low: Math.min(open, close) * 0.999,
			close,
			volume: 1_000 + i * 10,
		});
		price = close;
	}
	return bars;
};
