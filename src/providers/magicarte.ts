import { DeckBuilderProvider, type VendorOptions } from './deckbuilder.js';

export class MagiCarteProvider extends DeckBuilderProvider {
  constructor(options: VendorOptions) {
    super({ id: 'magicarte', name: 'MagiCarte', ...options });
  }
}
