import { Router } from 'express';

import { rawBody } from '@middleware/raw-body.js';

import { verifyHandler, webhookHandler } from '../controllers/webhook.controller.js';

const router = Router();
router.get('/', verifyHandler);
router.post('/', rawBody, webhookHandler);

export default router;
