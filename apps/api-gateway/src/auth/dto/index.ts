export { TokenRequestDto } from './token-request.dto';
export { RefreshTokenDto } from './refresh-token.dto';
export { TokenResponseDto } from './token-response.dto';
