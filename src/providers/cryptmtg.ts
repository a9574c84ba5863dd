import { DeckBuilderProvider, type VendorOptions } from './deckbuilder.js';

export class CryptMtgProvider extends DeckBuilderProvider {
  constructor(options: VendorOptions) {
    super({ id: 'cryptmtg', name: 'CryptMTG', ...options });
  }
}
