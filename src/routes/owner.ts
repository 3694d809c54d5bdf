import { BadRequestException } from '@nestjs/common';

// identity comes from the upstream auth layer; here it is only required
export function requireOwner(ownerId: string | undefined): string {
  if (!ownerId?.trim()) throw new BadRequestException('ownerId is required');
  return ownerId.trim();
}
