/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates params/query/body and wraps results in the response envelope.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod (parseOrThrow throws a 422 AppError).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { acknowledged, created, success } from '../../shared/http/envelope';
import { parseOrThrow } from '../../shared/http/validation';
import {
  createUserSchema,
  listUsersQuerySchema,
  updateUserSchema,
  userIdParamsSchema,
} from './user.schemas';
import { toUserListResponse, toUserResponse } from './user.responses';
import type { UserService } from './user.service';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(createUserSchema, req.body, 'Invalid request body');

    const user = await this.userService.createUser(body);

    return reply.status(201).send(created(toUserResponse(user)));
  }

  async listUsers(req: FastifyRequest, reply: FastifyReply) {
    const query = parseOrThrow(listUsersQuerySchema, req.query, 'Invalid query parameters');

    const page = await this.userService.listUsers(query);

    return reply.status(200).send(success(toUserListResponse(page)));
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'Invalid user id');

    const user = await this.userService.getUser(id);

    return reply.status(200).send(success(toUserResponse(user)));
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'Invalid user id');
    const body = parseOrThrow(updateUserSchema, req.body, 'Invalid request body');

    const user = await this.userService.updateUser(id, body);

    return reply.status(200).send(success(toUserResponse(user)));
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'Invalid user id');

    const message = await this.userService.deleteUser(id);

    return reply.status(200).send(acknowledged(message));
  }
}
