import { body, param } from 'express-validator';
import { addressBody, addressParam } from '../../middlewares/validators';
import { ROLES } from './permission.service';

const roleBody = body('role').isIn([...ROLES]).withMessage(`role must be one of ${ROLES.join(', ')}`);

export const hasRoleValidation = [
  param('role').isIn([...ROLES]).withMessage(`role must be one of ${ROLES.join(', ')}`),
  addressParam('address'),
];

export const roleChangeValidation = [roleBody, addressBody('account')];

export const renounceValidation = [roleBody];

export const proposeAdminValidation = [
  addressBody('candidate'),
  body('notBefore')
    .optional()
    .isInt({ min: 0 })
    .withMessage('notBefore must be a non-negative integer of unix seconds')
    .toInt(),
];
