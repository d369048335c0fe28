import { randomInt } from "node:crypto";
import bcrypt from "bcryptjs";

const SALT_ROUNDS = 10;

export type OtpCodeGenerator = (length: number) => string;

export const generateOtpCode: OtpCodeGenerator = (length) => {
  let code = "";
  for (let index = 0; index < length; index += 1) {
    code += String(randomInt(0, 10));
  }
  return code;
};

export async function hashOtpCode(code: string) {
  return bcrypt.hash(code, SALT_ROUNDS);
}

export async function matchesOtpCode(code: string, codeHash: string) {
  return bcrypt.compare(code, codeHash);
}
