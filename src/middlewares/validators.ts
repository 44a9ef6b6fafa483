import { body, param, query, ValidationChain } from 'express-validator';
import { isAddress } from '../utils/address';
import { isUintString } from '../utils/units';

const ADDRESS_MESSAGE = 'must be a 0x-prefixed 20-byte hex address';
const AMOUNT_MESSAGE = 'must be a non-negative integer string of base units';

export const addressBody = (field: string): ValidationChain =>
  body(field)
    .exists({ values: 'null' })
    .withMessage(`${field} is required`)
    .bail()
    .custom(isAddress)
    .withMessage(`${field} ${ADDRESS_MESSAGE}`);

export const optionalAddressBody = (field: string): ValidationChain =>
  body(field).optional().custom(isAddress).withMessage(`${field} ${ADDRESS_MESSAGE}`);

export const addressParam = (field: string): ValidationChain =>
  param(field).custom(isAddress).withMessage(`${field} ${ADDRESS_MESSAGE}`);

export const amountBody = (field = 'amount'): ValidationChain =>
  body(field)
    .exists({ values: 'null' })
    .withMessage(`${field} is required`)
    .bail()
    .custom(isUintString)
    .withMessage(`${field} ${AMOUNT_MESSAGE}`);

export const amountQuery = (field: string): ValidationChain =>
  query(field)
    .exists()
    .withMessage(`${field} is required`)
    .bail()
    .custom(isUintString)
    .withMessage(`${field} ${AMOUNT_MESSAGE}`);
