// ============================================
// Pose Integrator
// Applies a tick's MotionOutput to the vehicle pose
// ============================================

import { IDENTITY_QUAT, add, multiplyQuat, normalizeQuat, quatFromYaw, scale } from '#shared';
import type { MotionOutput, VehiclePose } from '#shared';
import type { PoseProvider } from './MotionStateMachine';

/**
 * Kinematic vehicle body. Owns the pose; the motion state machine only
 * reads it through getPose().
 */
export class VehicleBody implements PoseProvider {
  private pose: VehiclePose;
  private lastVelocity = { x: 0, y: 0, z: 0 };

  constructor(initial?: Partial<VehiclePose>) {
    this.pose = {
      position: { ...(initial?.position ?? { x: 0, y: 0, z: 0 }) },
      orientation: { ...(initial?.orientation ?? IDENTITY_QUAT) },
    };
  }

  getPose(): VehiclePose {
    return {
      position: { ...this.pose.position },
      orientation: { ...this.pose.orientation },
    };
  }

  getVelocity(): { x: number; y: number; z: number } {
    return { ...this.lastVelocity };
  }

  setPose(pose: VehiclePose): void {
    this.pose = { position: { ...pose.position }, orientation: { ...pose.orientation } };
  }

  /**
   * Integrate one tick: position += velocity * dt, then the rotation
   */
  apply(output: MotionOutput, deltaTime: number): void {
    this.lastVelocity = { ...output.velocity };
    this.pose.position = add(this.pose.position, scale(output.velocity, deltaTime));

    const rotation = output.rotation;
    switch (rotation.type) {
      case 'hold':
        break;
      case 'yaw': {
        // World-up rotation applied on the left
        const turned = multiplyQuat(quatFromYaw(rotation.degrees), this.pose.orientation);
        this.pose.orientation = normalizeQuat(turned) ?? this.pose.orientation;
        break;
      }
      case 'set':
        this.pose.orientation = normalizeQuat(rotation.orientation) ?? this.pose.orientation;
        break;
    }
  }
}
