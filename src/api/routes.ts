import { Router, Request, Response } from "express";
import { CarePlanner } from "../planner/carePlanner";
import { groupsForStep } from "../models/Schema";
import {
  collectPoints,
  createHomeSaleEvent,
  depletionMonth,
  homeSaleApplied,
  runway,
  yearsFunded,
} from "../engine/runway";
import { LoadError, SchemaError, ValidationError, errorMessage, formatZodIssues } from "../utils/errors";
import { LoadPlanRequestSchema, PlanRequestSchema, RunwayRequest, RunwayRequestSchema } from "../utils/validation";

/**
 * Map planner errors to responses. Input problems are the caller's (400);
 * schema problems and anything unexpected are ours (500).
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ValidationError || error instanceof LoadError) {
    res.status(400).json({ error: error.message, issues: error.issues });
    return;
  }
  console.error(`Error in ${context}:`, error);
  if (error instanceof SchemaError) {
    res.status(500).json({ error: "Schema error", message: error.message, issues: error.issues });
    return;
  }
  res.status(500).json({
    error: "Internal server error",
    message: errorMessage(error),
  });
}

function projectRunway(request: RunwayRequest, capYears: number) {
  const { monthlyIncome, monthlyCost, liquidAssets, homeSale, horizonMonths } = request;
  const sale = homeSale ? createHomeSaleEvent(homeSale.salePrice, homeSale.costs, homeSale.month) : null;
  const result = runway(monthlyIncome, monthlyCost, liquidAssets, sale, { horizonMonths });
  const funded = yearsFunded(result, capYears);
  return {
    kind: result.kind,
    monthlyShortfall: result.monthlyShortfall,
    depletionMonth: depletionMonth(result),
    yearsFunded: funded.years,
    yearsFundedCapped: funded.capped,
    homeSale: sale,
    homeSaleApplied: homeSaleApplied(result),
    points: collectPoints(result),
  };
}

export function createRouter(planner: CarePlanner): Router {
  const router = Router();

  /**
   * GET /api/schema
   * Resolved schema: groups, fields, rate tables and settings
   */
  router.get("/schema", (req: Request, res: Response) => {
    res.json(planner.getSchema());
  });

  /**
   * GET /api/schema/steps/:step
   * Groups rendered on one wizard step
   */
  router.get("/schema/steps/:step", (req: Request, res: Response) => {
    const step = Number(req.params.step);
    if (!Number.isInteger(step) || step < 1) {
      return res.status(400).json({ error: `Invalid step "${req.params.step}"` });
    }
    res.json({ step, groups: groupsForStep(planner.getSchema(), step) });
  });

  /**
   * GET /api/state/defaults
   * A fresh session's values
   */
  router.get("/state/defaults", (req: Request, res: Response) => {
    res.json(planner.createState().toJSON());
  });

  /**
   * POST /api/plan
   * Plan from flat field values. Invalid values fall back to defaults and
   * are listed in flaggedFields; unknown keys are rejected.
   */
  router.post("/plan", (req: Request, res: Response) => {
    const parsed = PlanRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid plan request", issues: formatZodIssues(parsed.error) });
    }
    try {
      res.json(planner.planFromValues(parsed.data.inputs));
    } catch (error: unknown) {
      sendError(res, error, "planning");
    }
  });

  /**
   * POST /api/plan/load
   * Plan from a saved plan document (JSON string or object)
   */
  router.post("/plan/load", (req: Request, res: Response) => {
    const parsed = LoadPlanRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid load request", issues: formatZodIssues(parsed.error) });
    }
    try {
      const state = planner.createState();
      const { ignoredKeys } = state.load(parsed.data.plan);
      if (ignoredKeys.length > 0) {
        console.warn(`Saved plan contained unknown fields: ${ignoredKeys.join(", ")}`);
      }
      res.json({ ignoredKeys, state: state.toJSON(), summary: planner.plan(state) });
    } catch (error: unknown) {
      sendError(res, error, "plan load");
    }
  });

  /**
   * POST /api/runway
   * Runway projection from totals
   */
  router.post("/runway", (req: Request, res: Response) => {
    const parsed = RunwayRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid runway request", issues: formatZodIssues(parsed.error) });
    }
    try {
      res.json(projectRunway(parsed.data, planner.getSchema().settings.displayCapYears));
    } catch (error: unknown) {
      sendError(res, error, "runway");
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Senior Care Cost Planner API",
      version: "1.0.0",
      schemaVersion: planner.getSchema().version,
      endpoints: {
        schema: "GET /api/schema - Resolved wizard schema",
        step: "GET /api/schema/steps/:step - Groups for one wizard step",
        defaults: "GET /api/state/defaults - Default field values",
        plan: "POST /api/plan - Monthly cost, income, gap and runway from field values",
        load: "POST /api/plan/load - Plan from a saved plan document",
        runway: "POST /api/runway - Runway projection from totals",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
