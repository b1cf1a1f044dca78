// src/chat/chat.errors.ts
import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';

export class ThreadNotFoundException extends NotFoundException {
  constructor(readonly threadId: string) {
    super(`Thread ${threadId} was not found`);
  }
}

export class ChatConflictException extends ConflictException {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class InvalidChatInputException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

export class ChatStorageException extends InternalServerErrorException {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/** Repository used outside its enter/exit window. */
export class RepositoryStateException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RepositoryStateException';
  }
}
