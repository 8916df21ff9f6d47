import bcrypt from 'bcryptjs';
import type { User } from '@shared/schema';
import { ACCOUNT_MESSAGES } from '@shared/messages';
import type { IStorage, UserUpdate } from '../storage';
import type { TokenPair, TokenService } from './tokenService';
import type { MediaStore } from './mediaStore';
import type { IntentJournal } from './intentJournal';
import type { OperationInput, ProfileUpdateInput, SignupInput } from '../validation/schemas';
import {
  AuthenticationError,
  ConflictError,
  NotFoundError,
  ValidationError,
  type FieldErrors,
} from '../middleware/errorHandler';
import { logger } from '../utils/logger';

export interface AccountServiceDeps {
  storage: IStorage;
  tokens: TokenService;
  media: MediaStore;
  journal: IntentJournal;
  bcryptRounds: number;
}

export class AccountService {
  // Compared against when the username is unknown so both paths cost a hash
  private dummyHash?: Promise<string>;

  constructor(private readonly deps: AccountServiceDeps) {}

  private fallbackHash(): Promise<string> {
    this.dummyHash ??= bcrypt.hash('not-a-real-password', this.deps.bcryptRounds);
    return this.dummyHash;
  }

  private async uniquenessErrors(
    username: string | undefined,
    email: string | undefined,
    excludeUserId?: number
  ): Promise<FieldErrors> {
    const errors: FieldErrors = {};
    if (username !== undefined) {
      const owner = await this.deps.storage.getUserByUsername(username);
      if (owner && owner.id !== excludeUserId) errors.username = [ACCOUNT_MESSAGES.username.exists];
    }
    if (email !== undefined) {
      const owner = await this.deps.storage.getUserByEmail(email);
      if (owner && owner.id !== excludeUserId) errors.email = [ACCOUNT_MESSAGES.email.exists];
    }
    return errors;
  }

  async signup(input: SignupInput): Promise<User> {
    const { storage, media, journal } = this.deps;

    const errors = await this.uniquenessErrors(input.username, input.email);
    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }

    if (await media.exists(media.userRoot(input.username))) {
      throw new ConflictError('User directory already exists');
    }

    const password = await bcrypt.hash(input.password, this.deps.bcryptRounds);

    const user = await journal.run({ operation: 'create_user_root', username: input.username }, async applied => {
      await media.createUserRoot(input.username);
      applied();
      return storage.createUser({
        firstName: input.first_name,
        lastName: input.last_name,
        username: input.username,
        email: input.email,
        contact: input.contact,
        password,
      });
    });

    logger.security('USER_SIGNUP', { userId: user.id });
    return user;
  }

  async signin(input: OperationInput<'signin'>): Promise<TokenPair> {
    const user = await this.deps.storage.getUserByUsername(input.username);
    const hash = user ? user.password : await this.fallbackHash();
    const matches = await bcrypt.compare(input.password, hash);

    if (!user || !matches) {
      logger.security('SIGNIN_FAILED', { username: input.username });
      throw new AuthenticationError(ACCOUNT_MESSAGES.invalidCredentials, 'INVALID_CREDENTIALS');
    }

    const pair = await this.deps.tokens.issue(user);
    logger.security('USER_SIGNIN', { userId: user.id });
    return pair;
  }

  async signOut(user: User, input: OperationInput<'signOut'>): Promise<void> {
    await this.deps.tokens.revoke(input.refresh, user.id);
    logger.security('USER_SIGNOUT', { userId: user.id });
  }

  async refresh(input: OperationInput<'refresh'>): Promise<{ access: string }> {
    return { access: await this.deps.tokens.refresh(input.refresh) };
  }

  async checkEmail(input: OperationInput<'emailCheck'>): Promise<{ email: string }> {
    const errors = await this.uniquenessErrors(undefined, input.email);
    if (errors.email) throw new ValidationError(errors);
    return { email: input.email };
  }

  async checkUsername(input: OperationInput<'usernameCheck'>): Promise<{ username: string }> {
    const errors = await this.uniquenessErrors(input.username, undefined);
    if (errors.username) throw new ValidationError(errors);
    return { username: input.username };
  }

  async getProfile(userId: number): Promise<User> {
    const user = await this.deps.storage.getUser(userId);
    if (!user) throw new NotFoundError('User');
    return user;
  }

  /**
   * Applies a full or partial profile update. A username change moves the
   * user's media directory along with the row.
   */
  async updateProfile(user: User, input: ProfileUpdateInput): Promise<User> {
    const { storage, media, journal } = this.deps;

    const errors = await this.uniquenessErrors(input.username, input.email, user.id);
    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }

    const updates: UserUpdate = {};
    if (input.first_name !== undefined) updates.firstName = input.first_name;
    if (input.last_name !== undefined) updates.lastName = input.last_name;
    if (input.username !== undefined) updates.username = input.username;
    if (input.email !== undefined) updates.email = input.email;
    if (input.contact !== undefined) updates.contact = input.contact;
    if (input.password !== undefined) {
      updates.password = await bcrypt.hash(input.password, this.deps.bcryptRounds);
    }

    const from = user.username;
    const to = input.username;
    let updated: User | undefined;

    if (to !== undefined && from !== null && to !== from) {
      if (await media.exists(media.userRoot(to))) {
        throw new ConflictError('User directory already exists');
      }
      updated = await journal.run({ operation: 'rename_user_root', userId: user.id, from, to }, async applied => {
        await media.renameUserRoot(from, to);
        applied();
        return storage.updateUser(user.id, updates);
      });
    } else {
      updated = await storage.updateUser(user.id, updates);
      if (updated?.username && from === null) {
        await media.ensureDir(media.userRoot(updated.username));
      }
    }

    if (!updated) throw new NotFoundError('User');
    return updated;
  }
}
