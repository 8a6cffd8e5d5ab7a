import { Injectable } from '@nestjs/common';
import { randomInt } from 'crypto';

const LOCAL_PART_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const PASSWORD_ALPHABET =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*';

export const LOCAL_PART_LENGTH = 8;
export const PASSWORD_LENGTH = 16;

const MAILBOX_ADDRESS_PATTERN = /^[a-z0-9._%+-]+@[a-z0-9-]+(?:\.[a-z0-9-]+)+$/;

export function normalizeMailboxAddress(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isValidMailboxAddress(address: string): boolean {
  return address.length <= 254 && MAILBOX_ADDRESS_PATTERN.test(address);
}

function pickFrom(alphabet: string, length: number): string {
  let output = '';
  for (let index = 0; index < length; index += 1) {
    output += alphabet[randomInt(alphabet.length)];
  }
  return output;
}

@Injectable()
export class MailboxCredentialsGenerator {
  generateLocalPart(): string {
    return pickFrom(LOCAL_PART_ALPHABET, LOCAL_PART_LENGTH);
  }

  generatePassword(): string {
    return pickFrom(PASSWORD_ALPHABET, PASSWORD_LENGTH);
  }
}
