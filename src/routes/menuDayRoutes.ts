import { Router } from 'express';
import { protect, restrictTo } from '../middleware/authMiddleware';
import { getMenuDay, getMenuWeek, saveMenuDay } from '../controllers/menuDayController';

const router = Router();

// 1. All routes require login
router.use(protect);

// 2. Anyone can browse a cook's week
router.get('/week', getMenuWeek);

// 3. Cooks manage their own days
router
  .route('/:date')
  .get(restrictTo('cook'), getMenuDay)
  .put(restrictTo('cook'), saveMenuDay);

export default router;
