/**
 * Post routes.
 *
 * - GET  /posts  → every post, in insertion order
 * - POST /posts  → create one; 201 with `Location: /posts?id=<id>`
 *
 * Request bodies are checked by Ajv against the entity's JSON Schema before
 * the handler runs; the store validates again with Zod and the table's
 * constraints have the last word.
 */

import type { FastifyInstance } from 'fastify'
import type { PostInput } from '../../entities/posts/post.schema'
import { errorSchema } from '../errorHandler'

export const POSTS_PATH = '/posts'

export async function postRoutes(fastify: FastifyInstance) {
  const { posts } = fastify.stores

  const insertSchema = posts.schemas.insert.toJsonSchema()
  const selectSchema = posts.schemas.select.toJsonSchema()

  // --- GET /posts ---

  fastify.get(POSTS_PATH, {
    schema: {
      response: { 200: { type: 'array', items: selectSchema } },
    },
  }, async () => {
    return posts.findAll()
  })

  // --- POST /posts ---

  fastify.post<{ Body: PostInput }>(POSTS_PATH, {
    schema: {
      body: insertSchema,
      response: { 201: selectSchema, 400: errorSchema },
    },
  }, async (req, reply) => {
    const post = await posts.create(req.body)
    return reply
      .code(201)
      .header('location', `${POSTS_PATH}?id=${post.id}`)
      .send(post)
  })
}
