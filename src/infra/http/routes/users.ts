import { Router } from 'express';
import { z } from 'zod';
import type { UserService } from '../../../application/users/userService.js';
import type { UserFilter } from '../../../application/users/userRepository.js';
import { decodeCursor, encodeCursor } from '../cursor.js';
import { toUserResponse } from '../userResponse.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/users:
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/UserInput' }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error or invalid name/email
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already in use
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Users]
 *     summary: List users (keyset pagination, ordered by id)
 *     parameters:
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, default: 10 } }
 *       - { in: query, name: cursor, schema: { type: string } }
 *       - { in: query, name: email, schema: { type: string } }
 *       - { in: query, name: includeDeleted, schema: { type: boolean, default: false } }
 *       - { in: query, name: createdAfter, schema: { type: string, format: date-time } }
 *       - { in: query, name: createdBefore, schema: { type: string, format: date-time } }
 *     responses:
 *       200:
 *         description: One page of users. nextCursor is present only when the page is full.
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 data:
 *                   type: array
 *                   items: { $ref: '#/components/schemas/User' }
 *                 nextCursor: { type: string }
 *       400:
 *         description: Validation error or invalid cursor
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/count:
 *   get:
 *     tags: [Users]
 *     summary: Count users matching a filter
 *     parameters:
 *       - { in: query, name: email, schema: { type: string } }
 *       - { in: query, name: includeDeleted, schema: { type: boolean, default: false } }
 *       - { in: query, name: createdAfter, schema: { type: string, format: date-time } }
 *       - { in: query, name: createdBefore, schema: { type: string, format: date-time } }
 *     responses:
 *       200:
 *         description: Count
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 count: { type: integer }
 *
 * /api/users/by-email/{email}:
 *   get:
 *     tags: [Users]
 *     summary: Get an active user by email
 *     parameters:
 *       - { in: path, name: email, required: true, schema: { type: string } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: No active user with this email
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found or deleted
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Users]
 *     summary: Update name and email
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/UserInput' }
 *     responses:
 *       200:
 *         description: Updated user (unchanged when nothing differs)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error or invalid name/email
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found or deleted
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already in use, or concurrent modification
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Users]
 *     summary: Soft-delete a user
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: User not found or already deleted
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Concurrent modification
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const userBodySchema = z.object({
  name: z.string(),
  email: z.string(),
});

const userIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const emailParamsSchema = z.object({
  email: z.string().min(1),
});

const booleanQuery = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const filterQuerySchema = z.object({
  email: z.string().min(1).optional(),
  includeDeleted: booleanQuery.optional(),
  createdAfter: z.string().datetime({ offset: true }).optional(),
  createdBefore: z.string().datetime({ offset: true }).optional(),
});

const listQuerySchema = filterQuerySchema.extend({
  limit: z.coerce.number().int().positive().default(10),
  cursor: z.string().min(1).optional(),
});

function toFilter(query: z.infer<typeof filterQuerySchema>): UserFilter {
  return {
    includeDeleted: query.includeDeleted ?? false,
    email: query.email,
    createdAfter: query.createdAfter !== undefined ? new Date(query.createdAfter) : undefined,
    createdBefore: query.createdBefore !== undefined ? new Date(query.createdBefore) : undefined,
  };
}

export function createUserRoutes(userService: UserService) {
  const router = Router();

  router.post(
    '/',
    validate({ body: userBodySchema }),
    asyncHandler(async (req, res) => {
      const body = userBodySchema.parse(req.body);
      const user = await userService.createUser(
        body.name,
        body.email,
        req.requestContext.signal
      );
      res.status(201).json(toUserResponse(user));
    })
  );

  router.get(
    '/',
    validate({ query: listQuerySchema }),
    asyncHandler(async (req, res) => {
      const query = listQuerySchema.parse(req.query);
      const cursor = query.cursor !== undefined ? decodeCursor(query.cursor) : undefined;

      const page = await userService.listUsers(
        toFilter(query),
        cursor,
        query.limit,
        req.requestContext.signal
      );

      res.status(200).json({
        data: page.users.map(toUserResponse),
        ...(page.nextCursor ? { nextCursor: encodeCursor(page.nextCursor) } : {}),
      });
    })
  );

  router.get(
    '/count',
    validate({ query: filterQuerySchema }),
    asyncHandler(async (req, res) => {
      const query = filterQuerySchema.parse(req.query);
      const count = await userService.countUsers(toFilter(query), req.requestContext.signal);
      res.status(200).json({ count });
    })
  );

  router.get(
    '/by-email/:email',
    validate({ params: emailParamsSchema }),
    asyncHandler(async (req, res) => {
      const { email } = emailParamsSchema.parse(req.params);
      const user = await userService.getByEmail(email, req.requestContext.signal);
      res.status(200).json(toUserResponse(user));
    })
  );

  router.get(
    '/:id',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const user = await userService.getUser(id, req.requestContext.signal);
      res.status(200).json(toUserResponse(user));
    })
  );

  router.put(
    '/:id',
    validate({ params: userIdParamsSchema, body: userBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const body = userBodySchema.parse(req.body);
      const user = await userService.updateUser(
        id,
        body.name,
        body.email,
        req.requestContext.signal
      );
      res.status(200).json(toUserResponse(user));
    })
  );

  router.delete(
    '/:id',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      await userService.deleteUser(id, req.requestContext.signal);
      res.status(204).send();
    })
  );

  return router;
}
