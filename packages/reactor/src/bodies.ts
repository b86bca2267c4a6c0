import { z } from 'zod'

/** A resource as received from the API. Never mutated here. */
export type Body = Record<string, unknown>

const IdentitySchema = z.object({
  metadata: z.object({ uid: z.string().min(1) }).passthrough(),
})

/** The body has no `metadata.uid`, so no memory can be kept for it. */
export class MissingIdentityError extends Error {
  constructor() {
    super('Resource body has no metadata.uid')
    this.name = 'MissingIdentityError'
  }
}

export function getUid(body: Body): string {
  const parsed = IdentitySchema.safeParse(body)
  if (!parsed.success) {
    throw new MissingIdentityError()
  }
  return parsed.data.metadata.uid
}
