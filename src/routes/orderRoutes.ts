import { Router } from 'express';
import { protect, restrictTo } from '../middleware/authMiddleware';
import {
  cancelOrder,
  getCookOrderGroups,
  getCookOrders,
  getMyOrderHistory,
  getMyOrders,
  getWeekWithSelections,
  placeOrder,
  updateOrderStatus,
} from '../controllers/orderController';

const router = Router();

router.use(protect);

// Kitchen (Cook only). Registered before /:cookId/:date so the paths don't collide.
router.get('/cook', restrictTo('cook'), getCookOrders);
router.get('/cook/grouped', restrictTo('cook'), getCookOrderGroups);
router.patch('/:id/status', restrictTo('cook'), updateOrderStatus);

// Customers
router.get('/week', restrictTo('customer'), getWeekWithSelections);
router.get('/mine', restrictTo('customer'), getMyOrders);
router.get('/history', restrictTo('customer'), getMyOrderHistory);
router.post('/', restrictTo('customer'), placeOrder);
router.delete('/:cookId/:date', restrictTo('customer'), cancelOrder);

export default router;
