import { Types } from "mongoose";

export function parseObjectId(id: string) {
  if (!Types.ObjectId.isValid(id)) {
    return null;
  }
  return new Types.ObjectId(id);
}

export function newId() {
  return new Types.ObjectId().toString();
}
