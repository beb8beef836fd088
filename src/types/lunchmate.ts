// src/types/lunchmate.ts

export const MENU_DAY_STATUSES = ['Draft', 'Published', 'Closed'] as const;
export type MenuDayStatus = (typeof MENU_DAY_STATUSES)[number];

export const ORDER_STATUSES = ['Pending', 'Ready', 'Delivered', 'Cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const USER_ROLES = ['cook', 'customer'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const isMenuDayStatus = (value: unknown): value is MenuDayStatus =>
    MENU_DAY_STATUSES.some((status) => status === value);

export const isOrderStatus = (value: unknown): value is OrderStatus =>
    ORDER_STATUSES.some((status) => status === value);

export const isUserRole = (value: unknown): value is UserRole =>
    USER_ROLES.some((role) => role === value);
