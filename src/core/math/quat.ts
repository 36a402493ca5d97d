import type { Quat } from "../types.js";

export function normalize(q: Quat): Quat {
  const [x,y,z,w] = q;
  const n = Math.sqrt(x*x + y*y + z*z + w*w);
  if (n === 0) return [0,0,0,1];
  return [x/n, y/n, z/n, w/n];
}

export function multiply(a: Quat, b: Quat): Quat {
  // Hamilton product, assumes [x,y,z,w]
  const ax=a[0], ay=a[1], az=a[2], aw=a[3];
  const bx=b[0], by=b[1], bz=b[2], bw=b[3];
  const x = aw*bx + ax*bw + ay*bz - az*by;
  const y = aw*by - ax*bz + ay*bw + az*bx;
  const z = aw*bz + ax*by - ay*bx + az*bw;
  const w = aw*bw - ax*bx - ay*by - az*bz;
  return [x,y,z,w];
}

export function identity(): Quat {
  return [0,0,0,1];
}
