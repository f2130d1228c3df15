export interface BlindProfile {
  serviceUuid: string;
  notificationCharacteristicUuid: string;
  commandCharacteristicUuid: string;
}

export const blindProfile: BlindProfile = {
  serviceUuid: 'd973f2e0-b19e-11e2-9e96-0800200c9a66',
  notificationCharacteristicUuid: 'd973f2e1-b19e-11e2-9e96-0800200c9a66',
  commandCharacteristicUuid: 'd973f2e2-b19e-11e2-9e96-0800200c9a66',
};
