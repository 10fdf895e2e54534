export {
  InvalidApiKeyException,
  InvalidRefreshTokenException,
  ApiKeysNotConfiguredException,
} from './invalid-api-key.exception';
