import { addressParam, amountBody, optionalAddressBody } from '../../middlewares/validators';

export const currencyBalanceValidation = [addressParam('address')];

export const fundValidation = [optionalAddressBody('account'), amountBody()];
