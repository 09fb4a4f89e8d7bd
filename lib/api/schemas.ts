import { z } from "zod";
import { AgentConfig, randomAgent, starAgent } from "../agents/types";

// Schemas for validation
export const PointSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const SnakeSchema = z.object({
  id: z.string(),
  name: z.string().max(100).default(""),
  health: z.number().int().min(0).max(100),
  body: z.array(PointSchema).min(1),
  latency: z.union([z.string(), z.number()]).optional(),
  shout: z.string().optional(),
});

const RulesetSchema = z.object({
  name: z.string(),
  version: z.string().optional(),
  settings: z
    .object({
      foodSpawnChance: z.number().min(0).max(100).optional(), // percent
      minimumFood: z.number().int().min(0).optional(),
      hazardDamagePerTurn: z.number().int().min(0).optional(),
      royale: z
        .object({ shrinkEveryNTurns: z.number().int().min(0).optional() })
        .optional(),
    })
    .optional(),
});

export const GameRequestSchema = z
  .object({
    game: z.object({
      id: z.string(),
      ruleset: RulesetSchema.optional(),
      timeout: z.number().int().positive().default(500),
      source: z.string().optional(),
    }),
    turn: z.number().int().min(0),
    board: z.object({
      width: z.number().int().min(1).max(25),
      height: z.number().int().min(1).max(25),
      food: z.array(PointSchema),
      hazards: z.array(PointSchema).default([]),
      snakes: z.array(SnakeSchema),
    }),
    you: SnakeSchema,
  })
  .superRefine((request, ctx) => {
    const { width, height } = request.board;
    const outside = (p: { x: number; y: number }) =>
      p.x < 0 || p.x >= width || p.y < 0 || p.y >= height;

    request.board.food.forEach((p, i) => {
      if (outside(p)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["board", "food", i],
          message: "Food is outside the board",
        });
      }
    });
    request.board.snakes.forEach((snake, i) => {
      snake.body.forEach((p, j) => {
        if (outside(p)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["board", "snakes", i, "body", j],
            message: `Snake ${snake.id} is outside the board`,
          });
        }
      });
    });
  });

export type GameRequest = z.infer<typeof GameRequestSchema>;
export type SnakeSnapshot = z.infer<typeof SnakeSchema>;

const WeightsSchema = z
  .object({
    space: z.number(),
    trap: z.number(),
    food: z.number(),
    health: z.number(),
    length: z.number(),
    aggressionRadius: z.number().int().min(0),
  })
  .partial()
  .strict();

const StarDescriptorSchema = z
  .object({
    depth: z.number().int().min(1).max(12).optional(),
    searchedOpponents: z.number().int().min(0).max(3).optional(),
    weights: WeightsSchema.optional(),
  })
  .strict();

const RandomDescriptorSchema = z
  .object({
    seed: z.number().int().optional(),
  })
  .strict();

/**
 * Agent descriptors are tagged by their single key:
 * `{"AStar": {"depth": 3}}` or `{"Random": {"seed": 7}}`.
 */
export const AgentDescriptorSchema = z
  .union([
    z.object({ AStar: StarDescriptorSchema }).strict(),
    z.object({ Random: RandomDescriptorSchema }).strict(),
  ])
  .transform((descriptor): AgentConfig => {
    if ("AStar" in descriptor) {
      const { depth, searchedOpponents, weights } = descriptor.AStar;
      return starAgent({ depth, searchedOpponents, weights });
    }
    return randomAgent(descriptor.Random.seed);
  });

export const MoveResponseSchema = z.object({
  move: z.enum(["up", "down", "left", "right"]),
  shout: z.string().max(256).optional(),
});

export type MoveResponse = z.infer<typeof MoveResponseSchema>;
