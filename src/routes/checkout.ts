// src/routes/checkout.ts
import { Router, Request, Response } from 'express';
import { authenticate } from '../middleware/auth.js';
import { sendError } from '../middleware/errorHandler.js';
import {
  CheckoutDeps,
  enterDetailsStep,
  enterPaymentStep,
  submitDeliveryDetails,
  submitPayment,
} from '../services/checkout.js';

export function createCheckoutRouter(deps: CheckoutDeps): Router {
  const router = Router();
  router.use(authenticate());

  // GET /api/checkout
  router.get('/', (req: Request, res: Response) => {
    try {
      const data = enterDetailsStep(req.session);
      res.json({ step: 'details', data });
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /api/checkout
  router.post('/', (req: Request, res: Response) => {
    try {
      const data = submitDeliveryDetails(req.session, req.body);
      res.json({ step: 'payment', redirectTo: '/api/checkout/payment', data });
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /api/checkout/payment
  router.get('/payment', (req: Request, res: Response) => {
    try {
      const delivery = enterPaymentStep(req.session);
      res.json({ step: 'payment', delivery });
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /api/checkout/payment
  router.post('/payment', async (req: Request, res: Response) => {
    try {
      const customer = { id: req.user?.id ?? '', email: req.user?.email ?? '' };
      const placed = await submitPayment(req.session, req.body, customer, deps);
      res.status(201).json({
        message: `Payment successful. Order #${placed.orderId} placed!`,
        orderId: placed.orderId,
        total: placed.total,
        redirectTo: '/api/orders',
      });
    } catch (err) {
      sendError(res, err, 'Could not place your order. Please try again.');
    }
  });

  return router;
}
