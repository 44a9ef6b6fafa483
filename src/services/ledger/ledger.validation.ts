import { addressBody, addressParam, amountBody } from '../../middlewares/validators';

export const balanceValidation = [addressParam('address')];

export const allowanceValidation = [addressParam('owner'), addressParam('spender')];

export const mintValidation = [addressBody('to'), amountBody()];

export const transferValidation = [addressBody('to'), amountBody()];

export const transferFromValidation = [addressBody('from'), addressBody('to'), amountBody()];

export const approveValidation = [addressBody('spender'), amountBody()];
