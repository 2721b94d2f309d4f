import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
} from '@nestjs/common';

import { requireIdentity, RequestWithIdentity } from '../access/request-identity';
import { CredentialsService } from '../credentials/credentials.service';
import { Privilege, PublicUser } from '../credentials/types';
import { TokensService } from '../tokens/tokens.service';
import { TokenPair } from '../tokens/types';
import { toHttpException } from '../utils/to-http-exception';

type CredentialsBody = {
  email?: unknown;
  password?: unknown;
};

type RefreshBody = {
  refreshToken?: unknown;
};

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MAX_EMAIL_LENGTH = 254;
const MIN_PASSWORD_LENGTH = 8;
// bcrypt ignores everything past 72 bytes.
const MAX_PASSWORD_BYTES = 72;

@Controller('auth')
export class AuthController {
  private readonly logger = new Logger(AuthController.name);

  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly tokensService: TokensService,
  ) {}

  @Post('register')
  async register(@Body() body: CredentialsBody): Promise<{ user: PublicUser }> {
    const { email, password } = this.parseCredentials(body, true);

    try {
      const record = await this.credentialsService.createUser(email, password, Privilege.User);
      return { user: this.credentialsService.toPublicUser(record) };
    } catch (error) {
      throw toHttpException(error, this.logger);
    }
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() body: CredentialsBody): Promise<TokenPair> {
    const { email, password } = this.parseCredentials(body, false);

    try {
      const identity = await this.credentialsService.verifySecret(email, password);
      return await this.tokensService.issueTokenPair(identity);
    } catch (error) {
      throw toHttpException(error, this.logger);
    }
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() body: RefreshBody): Promise<TokenPair> {
    const refreshToken = this.parseRefreshToken(body);

    try {
      return await this.tokensService.redeemRefreshToken(refreshToken);
    } catch (error) {
      throw toHttpException(error, this.logger);
    }
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  async logout(@Body() body: RefreshBody): Promise<{ ok: true }> {
    const refreshToken = this.parseRefreshToken(body);

    try {
      await this.tokensService.revokeRefreshToken(refreshToken);
      return { ok: true };
    } catch (error) {
      throw toHttpException(error, this.logger);
    }
  }

  @Post('api-key')
  async rotateApiKey(@Req() request: RequestWithIdentity): Promise<{ apiKey: string }> {
    const identity = requireIdentity(request);

    try {
      const apiKey = await this.credentialsService.rotateApiKey(identity.userId);
      return { apiKey };
    } catch (error) {
      throw toHttpException(error, this.logger);
    }
  }

  private parseCredentials(
    body: CredentialsBody | undefined,
    enforcePolicy: boolean,
  ): { email: string; password: string } {
    const email = typeof body?.email === 'string' ? body.email.trim() : '';
    if (email.length === 0) {
      throw new BadRequestException('email is required');
    }

    const password = typeof body?.password === 'string' ? body.password : '';
    if (password.length === 0) {
      throw new BadRequestException('password is required');
    }

    if (enforcePolicy) {
      if (email.length > MAX_EMAIL_LENGTH || !EMAIL_PATTERN.test(email)) {
        throw new BadRequestException('email must be a valid email address');
      }
      if (password.length < MIN_PASSWORD_LENGTH) {
        throw new BadRequestException(`password must be at least ${MIN_PASSWORD_LENGTH} characters`);
      }
      if (Buffer.byteLength(password) > MAX_PASSWORD_BYTES) {
        throw new BadRequestException(`password must be at most ${MAX_PASSWORD_BYTES} bytes`);
      }
    }

    return { email, password };
  }

  private parseRefreshToken(body: RefreshBody | undefined): string {
    const refreshToken = typeof body?.refreshToken === 'string' ? body.refreshToken.trim() : '';
    if (refreshToken.length === 0) {
      throw new BadRequestException('refreshToken is required');
    }

    return refreshToken;
  }
}
