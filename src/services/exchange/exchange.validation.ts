import { body } from 'express-validator';
import { addressBody, amountBody, amountQuery } from '../../middlewares/validators';

export const quoteBuyValidation = [amountQuery('value')];

export const quoteSellValidation = [amountQuery('amount')];

export const buyValidation = [amountBody('value')];

export const receiveValidation = [
  amountBody('value'),
  body('data').optional().isString().withMessage('data must be a string'),
];

export const sellValidation = [amountBody('amount')];

export const withdrawTokensValidation = [amountBody('amount')];

export const transferOwnershipValidation = [addressBody('newOwner')];
