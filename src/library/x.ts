import {isIPv4} from 'net';

import * as x from 'x-value';

export const IPv4Address = x.string.refined<'ipv4 address'>(value => {
  if (!isIPv4(value)) {
    throw new TypeError('Invalid IPv4 address');
  }

  return value;
});

export type IPv4Address = x.TypeOf<typeof IPv4Address>;
