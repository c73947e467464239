// src/routes/trips.ts: thin HTTP surface over the trip service
import express, { type Request, type Response } from 'express';
import { asyncHandler } from '@/middleware/error.middleware';
import { validateTripModification } from '@/services/trip-modification';
import type { RevisionOutcome, TripService } from '@/services/trip-service';
import { validateTripRequest } from '@/types/trip-request';
import { isAgentCategory, type TripRequest, type TripState } from '@/types/trip';
import { ApiError, successBody } from '@/utils/errorResponse';

function tripRequestFrom(body: unknown): TripRequest {
  const validation = validateTripRequest(body);
  if (!validation.success) throw new ApiError('VALIDATION_ERROR', 'Invalid trip request', validation.error);
  return validation.data;
}

const tripNotFound = (): ApiError => new ApiError('NOT_FOUND', 'Trip not found');
const tripBusy = (state: TripState): ApiError =>
  new ApiError('TRIP_BUSY', `Trip is being planned (state: ${state}); wait for it to settle`);

function revisionResponse(tripId: string, outcome: RevisionOutcome, nothing: string) {
  switch (outcome.status) {
    case 'restored':
      return successBody({ tripId, state: outcome.state, revision: outcome.revision });
    case 'empty':
      throw new ApiError('NO_REVISION', nothing);
    case 'busy':
      throw tripBusy(outcome.state);
    case 'not-found':
      throw tripNotFound();
  }
}

export function createTripsRouter(tripService: TripService): express.Router {
  const router = express.Router();

  router.post(
    '/trips',
    asyncHandler(async (req: Request, res: Response) => {
      const tripId = await tripService.planTrip(tripRequestFrom(req.body));
      res.status(202).json(successBody({ tripId, state: 'created' }));
    }),
  );

  router.get(
    '/trips/:tripId',
    asyncHandler(async (req: Request, res: Response) => {
      const status = await tripService.getTripStatus(req.params.tripId ?? '');
      if (!status) throw tripNotFound();
      res.json(successBody(status));
    }),
  );

  router.delete(
    '/trips/:tripId',
    asyncHandler(async (req: Request, res: Response) => {
      const tripId = req.params.tripId ?? '';
      if (!tripService.cancelTrip(tripId)) {
        const status = await tripService.getTripStatus(tripId);
        if (!status) throw tripNotFound();
        throw new ApiError('NOT_RUNNING', `Trip is not running (state: ${status.state})`);
      }
      res.json(successBody({ tripId, cancelled: true }));
    }),
  );

  router.post(
    '/trips/:tripId/modifications',
    asyncHandler(async (req: Request, res: Response) => {
      const tripId = req.params.tripId ?? '';
      const validation = validateTripModification(req.body);
      if (!validation.success) throw new ApiError('VALIDATION_ERROR', 'Invalid modification', validation.error);

      const outcome = await tripService.modifyTrip(tripId, validation.data);
      switch (outcome.status) {
        case 'started':
          res.status(202).json(
            successBody({
              tripId,
              state: 'created',
              changed: outcome.changed,
              rerun: outcome.rerun,
              revision: outcome.revision,
            }),
          );
          return;
        case 'conflict':
          throw new ApiError('MODIFICATION_CONFLICT', 'Modification cannot be applied', outcome.conflicts);
        case 'busy':
          throw tripBusy(outcome.state);
        case 'not-found':
          throw tripNotFound();
      }
    }),
  );

  router.post(
    '/trips/:tripId/undo',
    asyncHandler(async (req: Request, res: Response) => {
      const tripId = req.params.tripId ?? '';
      const outcome = await tripService.undoModification(tripId);
      res.json(revisionResponse(tripId, outcome, 'Nothing to undo'));
    }),
  );

  router.post(
    '/trips/:tripId/redo',
    asyncHandler(async (req: Request, res: Response) => {
      const tripId = req.params.tripId ?? '';
      const outcome = await tripService.redoModification(tripId);
      res.json(revisionResponse(tripId, outcome, 'Nothing to redo'));
    }),
  );

  // Debug entry point: one agent, empty context.
  router.post(
    '/agents/:category',
    asyncHandler(async (req: Request, res: Response) => {
      const category = req.params.category ?? '';
      if (!isAgentCategory(category)) {
        throw new ApiError('NOT_FOUND', `Unknown agent category "${category}"`);
      }
      const result = await tripService.runSingleAgent(category, tripRequestFrom(req.body));
      res.json(successBody(result));
    }),
  );

  return router;
}
