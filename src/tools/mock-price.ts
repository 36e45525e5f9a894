import type { ScoringTool } from './types.js';
import { clamp01 } from './utils.js';

export const mockPriceSignalTool: ScoringTool = {
  name: 'mock_price_signal',
  description:
    'Returns the current Kalshi YES price as a [0,1] signal. Higher price = market thinks event is more likely.',
  run: (snapshot) => clamp01(snapshot.price)
};
