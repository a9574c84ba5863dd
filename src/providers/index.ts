import type { AppConfig } from '../config.js';
import type { Provider } from '../core/types.js';
import { CryptMtgProvider } from './cryptmtg.js';
import { FaceToFaceProvider } from './facetoface.js';
import { MagiCarteProvider } from './magicarte.js';

export const createProviders = (config: AppConfig): Provider[] => {
  const shared = { cacheTtlSeconds: config.cacheTtlSeconds, requestTimeoutMs: config.providerTimeoutMs };
  return [
    new CryptMtgProvider({ url: config.urls.cryptmtg, ...shared }),
    new MagiCarteProvider({ url: config.urls.magicarte, ...shared }),
    new FaceToFaceProvider({ url: config.urls.facetoface, ...shared })
  ];
};
