/**
 * Public profile APIs (no authentication)
 */
import express from 'express';
import { getUserPublicEvents } from '../../controllers/api/users.js';

const router = express.Router();

router.get('/:userId/events', getUserPublicEvents);

export default router;
