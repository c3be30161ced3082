import { Router, type Request, type Response } from 'express'

/** Echoes what the pipeline attached, for clients choosing an organization. */
export function createContextRouter(): Router {
  const router = Router()

  router.get('/', (req: Request, res: Response) => {
    const identity = req.auth?.identity ?? null

    res.json({
      user: identity
        ? { id: identity.subjectId, email: identity.email, organizationId: identity.organizationId }
        : null,
      tenant: req.tenant ?? null
    })
  })

  return router
}
